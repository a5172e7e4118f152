import fs from "node:fs";
import http from "node:http";
import net from "node:net";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createApiRoutes, MAX_BODY_BYTES } from "./api.js";
import { resolveConfig } from "./config.js";
import { silentLogger } from "./plugin-types.js";
import { createMealAnalyzerServices, type MealAnalyzerServices } from "./services.js";

// Helpers for HTTP testing
function createMockRequest(method: string, url: string, body?: string): http.IncomingMessage {
  const req = new http.IncomingMessage(new net.Socket());
  req.method = method;
  req.url = url;
  process.nextTick(() => {
    if (body) {
      req.emit("data", body);
    }
    req.emit("end");
  });
  return req;
}

class MockResponse {
  statusCode = 200;
  headers: Record<string, string> = {};
  body = "";
  ended = false;

  setHeader(key: string, value: string) {
    this.headers[key.toLowerCase()] = value;
  }

  end(data?: string) {
    if (data) {
      this.body += data;
    }
    this.ended = true;
  }

  json(): unknown {
    return JSON.parse(this.body);
  }
}

describe("API routes", () => {
  let tmpDir: string;
  let services: MealAnalyzerServices;
  let routes: ReturnType<typeof createApiRoutes>;

  function route(routePath: string) {
    const found = routes.find((r) => r.path === routePath);
    if (!found) {
      throw new Error(`route ${routePath} not registered`);
    }
    return found;
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "meal-analyzer-api-test-"));
    const config = resolveConfig({ recipeDbPath: path.join(tmpDir, "recipes.db"), extractionMethod: "ner" }, {});
    services = createMealAnalyzerServices(config, silentLogger, {
      lookup: { search: vi.fn(async () => null) },
      generator: { generate: vi.fn(async () => "[]") },
    });
    routes = createApiRoutes(services);
  });

  afterEach(() => {
    services.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  // ── POST /meal-analyzer/api/analyze ─────────────────────────────────────

  describe("POST /meal-analyzer/api/analyze", () => {
    it("analyzes a description", async () => {
      const req = createMockRequest("POST", "/meal-analyzer/api/analyze", JSON.stringify({ text: "two apples" }));
      const res = new MockResponse();
      await route("/meal-analyzer/api/analyze").handler(req, res);

      expect(res.statusCode).toBe(200);
      expect(res.headers["content-type"]).toBe("application/json; charset=utf-8");
      expect(res.json()).toEqual({
        result: {
          type: "combined",
          dishes: [],
          standaloneItems: [
            {
              foodName: "apples",
              quantity: 2,
              unit: "",
              nutrition: { calories: 120, protein: 1.6, fat: 0.4, carbs: 30 },
            },
          ],
        },
        totals: { calories: 120, protein: 1.6, fat: 0.4, carbs: 30 },
      });
    });

    it("breaks a stored dish into ingredients", async () => {
      services.recipes.importRecipes([
        { id: "r1", title: "Veggie Stew", ingredients: ["2 cups broccoli", "1 tbsp oil"] },
      ]);
      const req = createMockRequest("POST", "/meal-analyzer/api/analyze", JSON.stringify({ text: "veggie stew" }));
      const res = new MockResponse();
      await route("/meal-analyzer/api/analyze").handler(req, res);

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body).toMatchObject({ result: { type: "dish", dishName: "veggie stew", source: "database" } });
    });

    it("returns 400 for invalid JSON", async () => {
      const req = createMockRequest("POST", "/meal-analyzer/api/analyze", "{nope");
      const res = new MockResponse();
      await route("/meal-analyzer/api/analyze").handler(req, res);

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: "Invalid JSON body" });
    });

    it("returns 413 for an oversized body", async () => {
      const body = JSON.stringify({ text: "a".repeat(MAX_BODY_BYTES) });
      const req = createMockRequest("POST", "/meal-analyzer/api/analyze", body);
      const res = new MockResponse();
      await route("/meal-analyzer/api/analyze").handler(req, res);

      expect(res.statusCode).toBe(413);
      expect(res.json()).toEqual({ error: "Request body too large" });
    });

    it("returns 400 without text", async () => {
      const req = createMockRequest("POST", "/meal-analyzer/api/analyze", JSON.stringify({ text: "  " }));
      const res = new MockResponse();
      await route("/meal-analyzer/api/analyze").handler(req, res);

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: "'text' is required" });
    });

    it("returns 405 for other methods", async () => {
      const req = createMockRequest("GET", "/meal-analyzer/api/analyze");
      const res = new MockResponse();
      await route("/meal-analyzer/api/analyze").handler(req, res);

      expect(res.statusCode).toBe(405);
    });
  });

  // ── GET /meal-analyzer/api/nutrition ────────────────────────────────────

  describe("GET /meal-analyzer/api/nutrition", () => {
    it("resolves one food", async () => {
      const req = createMockRequest("GET", "/meal-analyzer/api/nutrition?food=Chicken&quantity=200&unit=g");
      const res = new MockResponse();
      await route("/meal-analyzer/api/nutrition").handler(req, res);

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        food: "chicken",
        quantity: 200,
        unit: "g",
        nutrition: { calories: 330, protein: 62, fat: 7.2, carbs: 0 },
      });
    });

    it("validates query parameters", async () => {
      const missing = new MockResponse();
      await route("/meal-analyzer/api/nutrition").handler(
        createMockRequest("GET", "/meal-analyzer/api/nutrition"),
        missing,
      );
      expect(missing.statusCode).toBe(400);
      expect(missing.json()).toEqual({ error: "'food' query parameter is required" });

      const negative = new MockResponse();
      await route("/meal-analyzer/api/nutrition").handler(
        createMockRequest("GET", "/meal-analyzer/api/nutrition?food=rice&quantity=-1"),
        negative,
      );
      expect(negative.statusCode).toBe(400);
      expect(negative.json()).toEqual({ error: "'quantity' must be a non-negative number" });
    });

    it("returns 405 for other methods", async () => {
      const req = createMockRequest("POST", "/meal-analyzer/api/nutrition", "{}");
      const res = new MockResponse();
      await route("/meal-analyzer/api/nutrition").handler(req, res);

      expect(res.statusCode).toBe(405);
    });
  });
});
