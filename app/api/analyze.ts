import { loadConfig, type AppConfig } from "../src/lib/config";
import { runAnalysis } from "../src/lib/pipeline/runAnalysis";
import type { AnalysisEvent } from "../src/types/analysis";
import { createBackend } from "./utils/backend";
import {
  createRequestId,
  logFailure,
  parseBody,
  sendJson,
  toUpload,
  uploadSchema,
  type ApiRequest,
  type ApiResponse
} from "./utils/http";

export const config = {
  runtime: "nodejs"
};

const SCOPE = "analyze";

const toWireEvent = (event: AnalysisEvent, requestId: string): Record<string, unknown> => {
  if (event.stage === "done") {
    return {
      requestId,
      stage: event.stage,
      message: event.message,
      sourceName: event.sourceName,
      rowCount: event.dataset.rowCount,
      columnCount: event.dataset.columns.length,
      result: event.result
    };
  }
  return { requestId, stage: event.stage, message: event.message };
};

/**
 * POST { fileName, content, encoding? } and receive newline-delimited JSON
 * progress events; the last line is either `done` or `failed`.
 */
export default async function handler(req: ApiRequest, res: ApiResponse) {
  const requestId = createRequestId();

  if (req.method !== "POST") {
    logFailure(SCOPE, requestId, null, "Method Not Allowed");
    return sendJson(res, 405, { ok: false, error: "Method Not Allowed", requestId });
  }

  const parsedBody = await parseBody(req);
  if (!parsedBody.ok) {
    logFailure(SCOPE, requestId, parsedBody.error, "Invalid JSON");
    return sendJson(res, 400, { ok: false, error: "Invalid request", requestId });
  }

  const validated = uploadSchema.safeParse(parsedBody.body);
  if (!validated.success) {
    logFailure(SCOPE, requestId, validated.error, "Invalid request");
    return sendJson(res, 400, { ok: false, error: "Invalid request", requestId });
  }

  let appConfig: AppConfig;
  try {
    appConfig = loadConfig();
  } catch (error) {
    logFailure(SCOPE, requestId, error, "Invalid configuration");
    return sendJson(res, 500, { ok: false, error: "Invalid configuration", requestId });
  }

  console.info(`[${SCOPE}] start`, {
    requestId,
    fileName: validated.data.fileName,
    backend: appConfig.backend,
    model: appConfig.model
  });

  res.statusCode = 200;
  res.setHeader("Content-Type", "application/x-ndjson");

  let lastStage: AnalysisEvent["stage"] | null = null;
  try {
    for await (const event of runAnalysis(toUpload(validated.data), {
      backend: createBackend(appConfig),
      model: appConfig.model,
      timeoutSeconds: appConfig.timeoutSeconds
    })) {
      lastStage = event.stage;
      res.write(`${JSON.stringify(toWireEvent(event, requestId))}\n`);
    }
  } catch (error) {
    logFailure(SCOPE, requestId, error, "Analysis failed");
    res.write(`${JSON.stringify({ requestId, stage: "failed", message: "Analysis failed." })}\n`);
    lastStage = "failed";
  } finally {
    res.end();
  }

  if (lastStage === "done") {
    console.info(`[${SCOPE}] success`, { requestId });
  } else {
    logFailure(SCOPE, requestId, null, `Stopped at stage ${lastStage ?? "none"}`);
  }
}
