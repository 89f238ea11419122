#!/usr/bin/env node
import { resolveAppConfig } from "./config.js";
import { extractText } from "./core/extract.js";
import { listPersonas } from "./core/personas.js";
import { loadUploadFromPath } from "./core/uploads.js";
import { startRpcStdioServer } from "./rpc/stdio-server.js";

const argv = process.argv.slice(2);

void main(argv).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[pitchdesk] fatal: ${message}`);
  process.exitCode = 1;
});

async function main(args: string[]): Promise<void> {
  const first = (args[0] ?? "").trim().toLowerCase();

  if (!first || first === "rpc") {
    // refuse to serve anything without a usable key
    const config = resolveAppConfig();
    await startRpcStdioServer(config);
    return;
  }

  if (first === "personas") {
    for (const persona of listPersonas()) {
      console.log(`${persona.name} [${persona.kind}]\n  ${persona.instruction}`);
    }
    return;
  }

  if (first === "extract") {
    const target = args[1] ?? "";
    const loaded = loadUploadFromPath(target);
    if (!loaded.ok) {
      throw new Error(loaded.error);
    }
    process.stdout.write(`${await extractText(loaded.file)}\n`);
    return;
  }

  console.error(`unknown subcommand: ${args[0]}`);
  console.error("usage:");
  console.error("  pitchdesk [rpc]          # start json-rpc stdio server");
  console.error("  pitchdesk personas       # list personas");
  console.error("  pitchdesk extract <file> # print extracted document text");
  process.exitCode = 1;
}
