import Database from "better-sqlite3";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ingredientLines, RecipeStore, resolveRecipeDbPath } from "./recipe-store.js";

describe("RecipeStore", () => {
  let tmpDir: string;
  let dbPath: string;
  let store: RecipeStore;
  const logger = { debug() {}, info() {}, warn: vi.fn(), error() {} };

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "meal-analyzer-recipes-test-"));
    dbPath = path.join(tmpDir, "nested", "recipes.db");
    logger.warn.mockClear();
    store = new RecipeStore(dbPath, logger);
  });

  afterEach(() => {
    store.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  // ── Schema ──────────────────────────────────────────────────────────────

  it("creates the database and parent directories", () => {
    expect(fs.existsSync(dbPath)).toBe(true);
    expect(store.count()).toBe(0);
  });

  // ── Lookup ──────────────────────────────────────────────────────────────

  it("finds recipes by case-insensitive title substring", () => {
    store.importRecipes([
      { id: "r1", title: "Chicken Curry", ingredients: ["200g chicken", { text: "1 cup rice" }] },
    ]);

    expect(store.findByTitle("curry")).toEqual({
      title: "chicken curry",
      ingredients: ["200g chicken", "1 cup rice"],
    });
    expect(store.findByTitle("CHICKEN")?.title).toBe("chicken curry");
  });

  it("returns null for misses and blank names", () => {
    store.importRecipes([{ id: "r1", title: "Tomato Soup", ingredients: ["2 tomatoes"] }]);

    expect(store.findByTitle("pizza")).toBeNull();
    expect(store.findByTitle("  ")).toBeNull();
  });

  it("matches LIKE wildcards literally", () => {
    store.importRecipes([
      { id: "r1", title: "Tomato Soup", ingredients: ["2 tomatoes"] },
      { id: "r2", title: "100% Juice", ingredients: ["250ml orange juice"] },
    ]);

    expect(store.findByTitle("%")?.title).toBe("100% juice");
    expect(store.findByTitle("_")).toBeNull();
  });

  it("returns the first inserted match", () => {
    store.importRecipes([
      { id: "r1", title: "Beef Stew", ingredients: ["500g beef"] },
      { id: "r2", title: "Irish Stew", ingredients: ["500g lamb"] },
    ]);

    expect(store.findByTitle("stew")?.title).toBe("beef stew");
  });

  it("returns null and warns on corrupt ingredients", () => {
    const raw = new Database(dbPath);
    raw.prepare("INSERT INTO recipes (id, title, ingredients) VALUES (?, ?, ?)").run("bad", "Broken Pie", "{not json");
    raw.close();

    expect(store.findByTitle("broken")).toBeNull();
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  // ── Import ──────────────────────────────────────────────────────────────

  it("upserts by id", () => {
    store.importRecipes([{ id: "r1", title: "Pancakes", ingredients: ["2 eggs"] }]);
    store.importRecipes([{ id: "r1", title: "Fluffy Pancakes", ingredients: ["3 eggs"] }]);

    expect(store.count()).toBe(1);
    expect(store.findByTitle("pancakes")).toEqual({ title: "fluffy pancakes", ingredients: ["3 eggs"] });
  });

  it("imports a JSON file and skips records without id or title", () => {
    const file = path.join(tmpDir, "recipes.json");
    fs.writeFileSync(
      file,
      JSON.stringify([
        {
          id: "a",
          title: "Beef Stew",
          ingredients: [{ text: "500g beef" }, "2 carrots"],
          instructions: [{ text: "Simmer for two hours" }],
        },
        { title: "No id" },
        "not a record",
      ]),
    );

    expect(store.importRecipesFromFile(file)).toBe(1);
    expect(store.findByTitle("beef stew")).toEqual({ title: "beef stew", ingredients: ["500g beef", "2 carrots"] });
    expect(logger.warn).toHaveBeenCalledWith("meal-analyzer: skipping recipe without id or title");
  });

  it("rejects files that are not arrays", () => {
    const file = path.join(tmpDir, "recipes.json");
    fs.writeFileSync(file, JSON.stringify({ id: "a" }));

    expect(() => store.importRecipesFromFile(file)).toThrow(/must contain a JSON array/);
  });
});

describe("ingredientLines", () => {
  it("keeps strings and text records", () => {
    expect(ingredientLines([1, "a", { text: "b" }, { foo: 1 }, null])).toEqual(["a", "b"]);
    expect(ingredientLines("a")).toEqual([]);
  });
});

describe("resolveRecipeDbPath", () => {
  it("honours the state directory override", () => {
    expect(resolveRecipeDbPath({ MEAL_ANALYZER_STATE_DIR: "/var/lib/meals" })).toBe(
      path.join("/var/lib/meals", "meal-analyzer", "recipes.db"),
    );
  });
});
