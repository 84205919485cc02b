import "dotenv/config";
import { loadConfig } from "./config";
import { DedupFileLogger } from "./log/writer";
import { logger } from "./util/logger";
import { sleep } from "./util/sleep";

const ROUNDS = 20;
const PAUSE_MS = 250;

async function main() {
  const config = loadConfig();
  const log = new DedupFileLogger(config.writer);
  log.onWriteFailure((msg, err) => {
    logger.error({ err: err.message, msg }, "Write failed");
  });

  logger.info({ logFile: log.getLogName(), staleMs: config.writer.staleMs }, "Demo starting");

  log.write("Starting duplicate write test…");
  for (let i = 1; i <= ROUNDS; i++) {
    await sleep(PAUSE_MS);
    await log.writeAsync("This is a test message for duplicate checking.");
  }

  log.writeDeferred("Starting deferred write test…");
  for (let i = 1; i <= ROUNDS; i++) {
    await sleep(PAUSE_MS);
    log.writeDeferred("This is a test message for deferred writing.");
  }

  log.write("None-level lines go to the console only.", "None");
  log.write("Logging tests completed.", "Success");

  await log.flush();
  logger.info({ logFile: log.getLogName() }, "Each test message should appear once per stale window");

  log.dispose();
  await log.flush();
}

main().catch((err: unknown) => {
  logger.error({ err }, "Demo failed");
  process.exitCode = 1;
});
