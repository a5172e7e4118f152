import type { IncomingMessage } from "node:http";
import type { MealAnalyzerServices } from "./services.js";
import { mealTotals } from "./summary.js";

/** The parts of a ServerResponse the handlers write to. */
export type ApiResponse = {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body?: string): unknown;
};

// ── Helpers ─────────────────────────────────────────────────────────────────

export const MAX_BODY_BYTES = 1_000_000;

class BodyTooLargeError extends Error {
  constructor(limit: number) {
    super(`request body exceeds ${limit} bytes`);
    this.name = "BodyTooLargeError";
  }
}

function sendJson(res: ApiResponse, status: number, payload: unknown): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.end(JSON.stringify(payload));
}

function sendError(res: ApiResponse, status: number, error: string): void {
  sendJson(res, status, { error });
}

/** Collect the body as text; rejects with BodyTooLargeError past `limit` bytes. */
function collectBody(req: IncomingMessage, limit = MAX_BODY_BYTES): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: string[] = [];
    let size = 0;
    let overflowed = false;
    req.setEncoding("utf-8");
    req.on("data", (chunk: string) => {
      if (overflowed) return;
      size += Buffer.byteLength(chunk);
      if (size > limit) {
        overflowed = true;
        reject(new BodyTooLargeError(limit));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(chunks.join("")));
    req.on("error", reject);
  });
}

function queryOf(req: IncomingMessage): URLSearchParams {
  return new URL(req.url ?? "/", "http://localhost").searchParams;
}

// ── Route handlers ──────────────────────────────────────────────────────────

async function handleAnalyze(
  services: MealAnalyzerServices,
  req: IncomingMessage,
  res: ApiResponse,
): Promise<void> {
  let raw: string;
  try {
    raw = await collectBody(req);
  } catch (err) {
    if (err instanceof BodyTooLargeError) {
      sendError(res, 413, "Request body too large");
    } else {
      sendError(res, 400, `Could not read request body: ${String(err)}`);
    }
    return;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    sendError(res, 400, "Invalid JSON body");
    return;
  }

  if (typeof parsed !== "object" || parsed === null) {
    sendError(res, 400, "Invalid JSON body");
    return;
  }
  const text = "text" in parsed && typeof parsed.text === "string" ? parsed.text.trim() : "";
  if (!text) {
    sendError(res, 400, "'text' is required");
    return;
  }
  const useStandardRecipe =
    "useStandardRecipe" in parsed && typeof parsed.useStandardRecipe === "boolean"
      ? parsed.useStandardRecipe
      : true;

  try {
    const result = await services.analyzer.analyze(text, useStandardRecipe);
    sendJson(res, 200, { result, totals: mealTotals(result) });
  } catch (err) {
    sendError(res, 500, String(err));
  }
}

async function handleNutrition(
  services: MealAnalyzerServices,
  req: IncomingMessage,
  res: ApiResponse,
): Promise<void> {
  const query = queryOf(req);
  const food = query.get("food")?.trim().toLowerCase() ?? "";
  if (!food) {
    sendError(res, 400, "'food' query parameter is required");
    return;
  }

  const rawQuantity = query.get("quantity");
  const quantity = rawQuantity === null ? 1 : Number(rawQuantity);
  if (!Number.isFinite(quantity) || quantity < 0) {
    sendError(res, 400, "'quantity' must be a non-negative number");
    return;
  }
  const unit = query.get("unit")?.trim().toLowerCase() ?? "";

  try {
    const nutrition = await services.nutrition.resolve(food, quantity, unit);
    sendJson(res, 200, { food, quantity, unit, nutrition });
  } catch (err) {
    sendError(res, 500, String(err));
  }
}

// ── Route registration ──────────────────────────────────────────────────────

export function createApiRoutes(services: MealAnalyzerServices) {
  return [
    {
      path: "/meal-analyzer/api/analyze",
      handler: async (req: IncomingMessage, res: ApiResponse) => {
        if (req.method !== "POST") {
          sendError(res, 405, "Method not allowed");
          return;
        }
        await handleAnalyze(services, req, res);
      },
    },
    {
      path: "/meal-analyzer/api/nutrition",
      handler: async (req: IncomingMessage, res: ApiResponse) => {
        if (req.method !== "GET") {
          sendError(res, 405, "Method not allowed");
          return;
        }
        await handleNutrition(services, req, res);
      },
    },
  ];
}
