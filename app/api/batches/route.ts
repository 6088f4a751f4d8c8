import { NextRequest, NextResponse } from "next/server";
import { getBatchOrchestrator } from "@/lib/batch/runtime";
import { submitBatchSchema } from "@/lib/batch/orchestrator";
import { httpStatusForError, toErrorMessage } from "@/lib/errors";

export async function GET(req: NextRequest) {
  const projectId = req.nextUrl.searchParams.get("projectId")?.trim() || undefined;
  const items = getBatchOrchestrator().listBatches(projectId);
  return NextResponse.json({ items });
}

export async function POST(req: NextRequest) {
  const body = await req.json().catch(() => ({}));
  const parsed = submitBatchSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json({ error: parsed.error.issues[0]?.message ?? "Invalid input" }, { status: 400 });
  }

  try {
    const run = await getBatchOrchestrator().submitBatch(parsed.data);
    return NextResponse.json({ batchId: run.batchId, lockedConfigRef: run.lockedConfigRef }, { status: 202 });
  } catch (error) {
    return NextResponse.json(
      { error: toErrorMessage(error, "Failed to submit batch") },
      { status: httpStatusForError(error) },
    );
  }
}
