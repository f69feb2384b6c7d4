import process from "node:process";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { VERSION, type WatchConfig, loadConfig } from "./config.js";
import { ReconciliationEngine } from "./engine/ReconciliationEngine.js";
import { Watcher } from "./engine/Watcher.js";
import { createSubsystemLogger, setLogLevel } from "./logging.js";
import { buildTools } from "./mcp/tools.js";
import { FileStore } from "./persistence/fileStore.js";
import type { SnapshotStore } from "./persistence/types.js";
import { createConsoleSink } from "./sink/consoleSink.js";
import type { EventSink } from "./sink/types.js";
import { createSource } from "./sources/index.js";
import type { SnapshotSource } from "./sources/types.js";

const log = createSubsystemLogger("server");

export type ServerOptions = {
  config: WatchConfig;
  transport?: Transport;
  source?: SnapshotSource;
  store?: SnapshotStore;
  sink?: EventSink;
};

function writeStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

export async function createServer(options: ServerOptions) {
  const { config } = options;
  const source = options.source ?? createSource(config);
  const store = options.store ?? new FileStore(config.stateDir);
  // stdout carries the protocol, so the default sink prints to stderr.
  const sink = options.sink ?? createConsoleSink({ verbose: config.verbose, write: writeStderr });

  const engine = new ReconciliationEngine(sink);
  await engine.initialize(source.identity, store);
  const watcher = new Watcher(engine, source, config.pollIntervalMs);
  const startedAt = Date.now();

  const server = new McpServer({ name: "ci-watch", version: VERSION });
  const tools = buildTools(engine, watcher, { version: VERSION, source: source.kind, startedAt });
  for (const tool of tools) {
    server.registerTool(
      tool.name,
      {
        description: tool.description,
        inputSchema: tool.inputSchema
      },
      (args) => tool.handler(args)
    );
  }

  const transport = options.transport ?? new StdioServerTransport();
  await server.connect(transport);

  return { server, transport, engine, watcher };
}

export async function startServer(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const { watcher, engine } = await createServer({ config });

  await watcher.pollOnce();
  if (config.printRunning) {
    writeStderr(`Running jobs:\n  ${engine.listRunningJobNames().join("\n  ")}`);
  }
  if (config.pollIntervalMs > 0) {
    watcher.start();
  }

  const stdin = process.stdin;
  stdin.resume();

  // Keep the process alive while stdin is open, even with the loop disabled.
  const keepalive = setInterval(() => {
    // no-op
  }, 60_000);

  await new Promise<void>((resolve) => {
    const done = () => {
      clearInterval(keepalive);
      watcher.stop();
      log.debug("stdin closed, shutting down");
      resolve();
    };
    stdin.once("end", done);
    stdin.once("close", done);
  });
}
