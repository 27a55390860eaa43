import { Command } from "commander";
import { describeChunks } from "../auto-reply/chunk.js";
import { loadConfig } from "../config/config.js";
import { redactConfigValue } from "../config/redact.js";
import { startMeshRelay } from "../relay/start.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { VERSION } from "../version.js";
import { parsePositiveInt, runCommandWithRuntime } from "./cli-utils.js";

type ConfigOption = { config?: string };

export function formatChunkPreview(text: string, maxBytes: number): string {
  const stats = describeChunks(text, maxBytes);
  const lines = [
    `chars: ${stats.textLength}, bytes: ${stats.byteSize}, chunks: ${stats.chunkCount} (max ${maxBytes} B)`,
    `efficiency: ${(stats.efficiency * 100).toFixed(1)}%`,
  ];
  stats.chunks.forEach((chunk, index) => {
    lines.push(`[${index + 1}/${stats.chunkCount}] ${chunk}`);
  });
  return lines.join("\n");
}

export function buildProgram(runtime: RuntimeEnv = defaultRuntime): Command {
  const program = new Command();
  program
    .name("meshrelay")
    .description("Meshtastic MQTT router for AI, weather and email")
    .version(VERSION);

  program
    .command("run")
    .description("Connect to the broker and serve mesh users until interrupted")
    .option("-c, --config <path>", "Config file (default ~/.meshrelay/meshrelay.json5)")
    .action(async (opts: ConfigOption) => {
      await runCommandWithRuntime(runtime, async () => {
        const { config } = loadConfig({ configPath: opts.config });
        const relay = await startMeshRelay({ config });
        const signal = await runtime.waitForShutdown();
        runtime.log(`received ${signal}, shutting down`);
        await relay.stop();
      });
    });

  program
    .command("chunk")
    .description("Preview how a reply is split into mesh frames")
    .argument("<text...>", "Text to split")
    .option("-b, --bytes <n>", "Maximum UTF-8 bytes per chunk", "180")
    .action(async (words: string[], opts: { bytes: string }) => {
      await runCommandWithRuntime(runtime, async () => {
        const maxBytes = parsePositiveInt(opts.bytes, "--bytes");
        runtime.log(formatChunkPreview(words.join(" "), maxBytes));
      });
    });

  program
    .command("config")
    .description("Print the resolved config with secrets redacted")
    .option("-c, --config <path>", "Config file (default ~/.meshrelay/meshrelay.json5)")
    .action(async (opts: ConfigOption) => {
      await runCommandWithRuntime(runtime, async () => {
        const { config, configPath, fileFound } = loadConfig({ configPath: opts.config });
        runtime.log(`# ${configPath}${fileFound ? "" : " (not found, defaults + env)"}`);
        runtime.log(JSON.stringify(redactConfigValue(config), null, 2));
      });
    });

  return program;
}
