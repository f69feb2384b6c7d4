import { z } from "zod";
import type { ReconciliationEngine } from "../engine/ReconciliationEngine.js";
import type { Watcher } from "../engine/Watcher.js";
import { isRunning } from "../indicator.js";
import type { SourceKind } from "../sources/types.js";

const jobsShape = {
  running: z.boolean().optional()
};

const emptyShape = {};

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  structuredContent: Record<string, unknown>;
};

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: z.ZodRawShape;
  /**
   * Parses `args` against `inputSchema` itself. The MCP server has already
   * validated them by then; direct callers such as tests have not.
   */
  handler: (args: unknown) => Promise<ToolResult>;
};

export type ServerInfo = {
  version: string;
  source: SourceKind;
  startedAt: number;
};

/** Parses the raw arguments against the tool's shape before calling `run`. */
const defineTool = <T extends z.ZodRawShape>(tool: {
  name: string;
  description: string;
  inputSchema: T;
  run: (args: z.infer<z.ZodObject<T, "strip">>) => Promise<ToolResult>;
}): ToolDefinition => {
  const parser = z.object(tool.inputSchema);
  return {
    name: tool.name,
    description: tool.description,
    inputSchema: tool.inputSchema,
    handler: async (args) => tool.run(parser.parse(args ?? {}))
  };
};

export function buildTools(engine: ReconciliationEngine, watcher: Watcher, info: ServerInfo): ToolDefinition[] {
  const wrapResult = (data: Record<string, unknown>): ToolResult => ({
    content: [{ type: "text" as const, text: JSON.stringify(data) }],
    structuredContent: data
  });

  return [
    defineTool({
      name: "ci:jobs",
      description: "List watched jobs with their current status indicator.",
      inputSchema: jobsShape,
      run: async (args) => {
        const entries = engine.snapshot()?.entries() ?? [];
        const jobs = entries
          .filter(([, indicator]) => !args.running || isRunning(indicator))
          .map(([name, indicator]) => ({ name, indicator }));
        return wrapResult({ jobs });
      }
    }),
    defineTool({
      name: "ci:running",
      description: "List jobs with a build in progress.",
      inputSchema: emptyShape,
      run: async () => wrapResult({ jobs: engine.listRunningJobNames() })
    }),
    defineTool({
      name: "ci:snapshot",
      description: "Return the current snapshot in its persisted form.",
      inputSchema: emptyShape,
      run: async () => wrapResult({ snapshot: engine.serializedSnapshot() })
    }),
    defineTool({
      name: "ci:poll",
      description: "Fetch the job list now and report the resulting events.",
      inputSchema: emptyShape,
      run: async () => {
        const result = await watcher.pollOnce();
        if (!result) return wrapResult({ skipped: true });
        return wrapResult({
          skipped: false,
          firstObservation: result.firstObservation,
          changes: result.changes.map(({ job, outcome }) => ({ job, outcome })),
          ...(result.persistError ? { persistError: result.persistError.message } : {})
        });
      }
    }),
    defineTool({
      name: "ci:info",
      description: "Report version, watched server and uptime.",
      inputSchema: emptyShape,
      run: async () =>
        wrapResult({
          version: info.version,
          server: engine.serverIdentity,
          source: info.source,
          uptimeMs: Date.now() - info.startedAt
        })
    })
  ];
}
