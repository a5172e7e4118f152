import Database from "better-sqlite3";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { silentLogger, type PluginLogger } from "./plugin-types.js";

// ── Resolve database path ───────────────────────────────────────────────────

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const stateDir =
    env.MEAL_ANALYZER_STATE_DIR?.trim() || path.join(os.homedir(), ".meal-analyzer");
  return path.join(stateDir, "meal-analyzer");
}

export function resolveRecipeDbPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(resolveStateDir(env), "recipes.db");
}

// ── Schema ──────────────────────────────────────────────────────────────────

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS recipes (
  id           TEXT PRIMARY KEY,
  title        TEXT NOT NULL,
  ingredients  TEXT NOT NULL DEFAULT '[]',
  instructions TEXT NOT NULL DEFAULT '[]'
);

CREATE INDEX IF NOT EXISTS idx_recipes_title ON recipes(title);
`;

/** A stored ingredient is either a plain line or a `{ text }` record. */
export type StoredIngredient = string | { text: string };

export type RecipeRecord = {
  id: string;
  title: string;
  ingredients: StoredIngredient[];
  instructions?: Array<string | { text: string }>;
};

export type RecipeMatch = {
  title: string;
  ingredients: string[];
};

type RecipeRow = { title: string; ingredients: string };

/** Flatten stored ingredients to plain lines, dropping anything else. */
export function ingredientLines(raw: unknown): string[] {
  if (!Array.isArray(raw)) {
    return [];
  }
  const lines: string[] = [];
  for (const item of raw) {
    if (typeof item === "string") {
      lines.push(item);
    } else if (typeof item === "object" && item !== null && "text" in item && typeof item.text === "string") {
      lines.push(item.text);
    }
  }
  return lines;
}

// ── Store class ─────────────────────────────────────────────────────────────

export class RecipeStore {
  private db: Database.Database;
  private readonly logger: PluginLogger;

  constructor(dbPath?: string, logger: PluginLogger = silentLogger) {
    const resolvedPath = dbPath ?? resolveRecipeDbPath();
    const dir = path.dirname(resolvedPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    this.db = new Database(resolvedPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA_SQL);
    this.logger = logger;
  }

  // ── Queries ─────────────────────────────────────────────────────────────

  /** First recipe whose title contains the name, case-insensitively. */
  findByTitle(name: string): RecipeMatch | null {
    const needle = name.trim();
    if (!needle) {
      return null;
    }
    const row = this.db
      .prepare("SELECT title, ingredients FROM recipes WHERE title LIKE ? ESCAPE '\\' ORDER BY rowid LIMIT 1")
      .get(`%${escapeLike(needle)}%`) as RecipeRow | undefined;
    if (!row) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(row.ingredients);
    } catch (err) {
      this.logger.warn(`meal-analyzer: recipe "${row.title}" has invalid ingredients JSON: ${String(err)}`);
      return null;
    }
    return { title: row.title.toLowerCase(), ingredients: ingredientLines(parsed) };
  }

  count(): number {
    const row = this.db.prepare("SELECT COUNT(*) AS n FROM recipes").get() as { n: number };
    return row.n;
  }

  // ── Import ──────────────────────────────────────────────────────────────

  /** Insert or replace recipes in one transaction; returns how many were written. */
  importRecipes(records: RecipeRecord[]): number {
    const stmt = this.db.prepare(`
      INSERT INTO recipes (id, title, ingredients, instructions)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        title = excluded.title,
        ingredients = excluded.ingredients,
        instructions = excluded.instructions
    `);

    let written = 0;
    const txn = this.db.transaction(() => {
      for (const record of records) {
        if (!record.id || !record.title) {
          this.logger.warn(`meal-analyzer: skipping recipe without id or title`);
          continue;
        }
        stmt.run(
          record.id,
          record.title,
          JSON.stringify(record.ingredients),
          JSON.stringify(record.instructions ?? []),
        );
        written += 1;
      }
    });
    txn();
    return written;
  }

  /** Load a JSON array of recipe records from disk. */
  importRecipesFromFile(filePath: string): number {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    if (!Array.isArray(parsed)) {
      throw new Error(`Recipe file ${filePath} must contain a JSON array`);
    }
    const records: RecipeRecord[] = [];
    for (const item of parsed) {
      if (typeof item !== "object" || item === null) {
        continue;
      }
      const id = "id" in item && typeof item.id === "string" ? item.id : "";
      const title = "title" in item && typeof item.title === "string" ? item.title : "";
      const ingredients = "ingredients" in item ? ingredientLines(item.ingredients) : [];
      const instructions = "instructions" in item ? ingredientLines(item.instructions) : [];
      records.push({ id, title, ingredients, instructions });
    }
    return this.importRecipes(records);
  }

  // ── Cleanup ─────────────────────────────────────────────────────────────

  close(): void {
    this.db.close();
  }
}

function escapeLike(s: string): string {
  return s.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}
