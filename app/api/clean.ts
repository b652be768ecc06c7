import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { z } from "zod";
import { DatasetParseError } from "../src/lib/errors";
import { parseUpload } from "../src/lib/import/parseFile";
import { NOTHING_TO_CLEAN, runCleaning } from "../src/lib/pipeline/runCleaning";
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

const SCOPE = "clean";

const requestSchema = z.union([uploadSchema, z.object({}).strict()]);

/**
 * POST the same `{ fileName, content }` that was analyzed and receive the
 * cleaned CSV as an attachment. An empty body answers "nothing to clean".
 */
export default async function handler(req: ApiRequest, res: ApiResponse) {
  const requestId = createRequestId();

  if (req.method !== "POST") {
    logFailure(SCOPE, requestId, null, "Method Not Allowed");
    return sendJson(res, 405, { ok: false, error: "Method Not Allowed", requestId });
  }

  const parsedBody = await parseBody(req);
  if (!parsedBody.ok && parsedBody.error !== undefined) {
    logFailure(SCOPE, requestId, parsedBody.error, "Invalid JSON");
    return sendJson(res, 400, { ok: false, error: "Invalid request", requestId });
  }
  const validated = requestSchema.safeParse(parsedBody.ok ? parsedBody.body : {});
  if (!validated.success) {
    logFailure(SCOPE, requestId, validated.error, "Invalid request");
    return sendJson(res, 400, { ok: false, error: "Invalid request", requestId });
  }

  const body = validated.data;
  if (!("fileName" in body)) {
    console.info(`[${SCOPE}] nothing to clean`, { requestId });
    return sendJson(res, 200, { ok: true, requestId, artifact: null, message: NOTHING_TO_CLEAN });
  }

  console.info(`[${SCOPE}] start`, { requestId, fileName: body.fileName });

  try {
    const { dataset, sourceName } = parseUpload(toUpload(body));
    const outcome = await runCleaning(dataset, sourceName);
    if (outcome.artifactPath === null) {
      return sendJson(res, 200, { ok: true, requestId, artifact: null, message: outcome.message });
    }

    const csv = await readFile(outcome.artifactPath, "utf8");
    console.info(`[${SCOPE}] success`, {
      requestId,
      artifact: outcome.artifactPath,
      rowCount: outcome.rowCount,
      removedRows: outcome.removedRows
    });
    res.statusCode = 200;
    res.setHeader("Content-Type", "text/csv; charset=utf-8");
    res.setHeader("Content-Disposition", `attachment; filename="${basename(outcome.artifactPath)}"`);
    res.end(csv);
  } catch (error) {
    logFailure(SCOPE, requestId, error, "Cleaning failed");
    if (error instanceof DatasetParseError) {
      return sendJson(res, 400, { ok: false, error: error.message, requestId });
    }
    return sendJson(res, 500, { ok: false, error: "Cleaning failed", requestId });
  }
}
