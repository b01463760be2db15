// src/app/api/advisor/route.ts
export const runtime = "nodejs";
export const dynamic = "force-dynamic";

import { NextResponse } from "next/server";

import { askAdvisor, parseAdvisorRequest } from "@/lib/advisor";
import { loadAdvisorConfig } from "@/lib/config";
import { describeError } from "@/lib/errors";
import { createLogger } from "@/lib/log";

const log = createLogger("api/advisor");

function ok<T>(data: T, status = 200) { return NextResponse.json(data, { status }); }
function err(message: string, status = 400) { return NextResponse.json({ status: "error", kind: "invalid-request", message }, { status }); }

export async function POST(req: Request) {
  try {
    const body: unknown = await req.json().catch(() => null);
    const parsed = parseAdvisorRequest(body);
    if (typeof parsed === "string") return err(parsed);

    const result = await askAdvisor(parsed, loadAdvisorConfig());
    return ok(result);
  } catch (e) {
    log.error("Unexpected error", describeError(e));
    return ok({ status: "error", kind: "unknown", message: `Unexpected error: ${describeError(e)}` }, 500);
  }
}
