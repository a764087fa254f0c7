/**
 * CLI entry point
 *
 * Run: npm start
 * Reads settings from the environment (and .env), transcribes every media
 * file in INPUT_DIR into OUTPUT_DIR.
 */
import { runBatch } from "./batch";
import { configFromEnv } from "./config";
import { parseEnv } from "./env";
import { errorMessage, PipelineError } from "./errors";
import log, { configureLogger } from "./log";
import { WhisperClient } from "./transcription";

async function main(): Promise<number> {
  try {
    const env = parseEnv();
    configureLogger({
      level: env.LOG_LEVEL,
      pretty: env.LOG_PRETTY ?? process.stdout.isTTY === true,
    });

    const config = configFromEnv(env);
    const summary = await runBatch(config, {
      engine: new WhisperClient(config.engine),
    });
    if (summary.failed.length > 0) {
      log.warn(`${summary.failed.length} file(s) failed`, {
        files: summary.failed.map((entry) => entry.file.name),
      });
    }
    return 0;
  } catch (error) {
    const code = error instanceof PipelineError ? error.code : "unexpected";
    log.error(errorMessage(error), { code });
    return 1;
  }
}

main().then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    log.error(errorMessage(error));
    process.exitCode = 1;
  },
);
