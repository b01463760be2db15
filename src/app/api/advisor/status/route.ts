// src/app/api/advisor/status/route.ts
export const runtime = "nodejs";
export const dynamic = "force-dynamic";

import { NextResponse } from "next/server";

import { loadAdvisorConfig } from "@/lib/config";

export async function GET() {
  // only whether a server key exists, never the key
  const config = loadAdvisorConfig();
  return NextResponse.json({ serverKey: config.apiKey !== null, model: config.model });
}
