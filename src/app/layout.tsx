// src/app/layout.tsx
import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "Tabular EDA Dashboard",
  description: "Upload a CSV or spreadsheet, filter it, and explore its columns.",
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en" suppressHydrationWarning>
      <body className="antialiased">
        <div className="min-h-dvh text-[15px]">
          <header className="bg-gradient-to-r from-primary-600 via-fuchsia-600 to-cyan-500 text-white shadow-sm">
            <div className="mx-auto max-w-7xl px-6 py-5 flex items-center gap-3">
              <div className="h-9 w-9 rounded-xl bg-white/15 backdrop-blur-sm flex items-center justify-center shadow-inner">
                <span className="text-lg">⚡</span>
              </div>
              <div>
                <h1 className="text-xl font-semibold tracking-tight">Exploratory Data Analysis</h1>
                <p className="text-xs/5 opacity-90">Upload a table, filter it, and let the column types pick the charts.</p>
              </div>
            </div>
          </header>

          <main className="mx-auto max-w-7xl p-6">{children}</main>
        </div>
      </body>
    </html>
  );
}
