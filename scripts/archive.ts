import { parseArgs } from "./lib/args";
import { loadConfig } from "./lib/config";
import { createLogger } from "./lib/logger";
import { runArchive } from "./pipeline/run";
import { EXIT_CANCELLED, appendStepSummary, renderSummaryMarkdown } from "./pipeline/summary";

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const log = createLogger({ verbose: args.verbose, quiet: args.quiet });
  const config = await loadConfig(args.configPath, { outputDir: args.outputDir, formats: args.formats });

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    log.warn(`[CANCEL] ${signal} received, stopping`);
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const { summary } = await runArchive(config, { signal: controller.signal, log });
    const markdown = renderSummaryMarkdown(summary);
    if (!args.quiet) console.log(`\n${markdown}`);
    await appendStepSummary(markdown);
    process.exitCode = summary.exitCode;
  } catch (err) {
    if (!controller.signal.aborted) throw err;
    log.error("[CANCEL] run cancelled");
    process.exitCode = EXIT_CANCELLED;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

main().catch((err) => {
  const message = err instanceof Error ? (err.stack ?? err.message) : String(err);
  console.error(message);
  process.exitCode = 1;
});
