import type { IncomingMessage, ServerResponse } from "node:http";
import type { TSchema } from "@sinclair/typebox";

// ── Host contract ───────────────────────────────────────────────────────────
// The subset of the host plugin API this extension registers against.

export type PluginLogger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

export const silentLogger: PluginLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export type ToolResult<TDetails> = {
  content: Array<{ type: "text"; text: string }>;
  details: TDetails;
};

export type PluginTool<TDetails = unknown> = {
  name: string;
  description: string;
  parameters: TSchema;
  execute(id: string, params: Record<string, unknown>): Promise<ToolResult<TDetails>>;
};

export type HttpRoute = {
  path: string;
  handler: (req: IncomingMessage, res: ServerResponse) => Promise<void>;
};

export type MealAnalyzerPluginApi = {
  id: string;
  name: string;
  pluginConfig?: Record<string, unknown>;
  logger: PluginLogger;
  registerTool(tool: PluginTool, opts?: { optional?: boolean }): void;
  registerHttpRoute(route: HttpRoute): void;
};
