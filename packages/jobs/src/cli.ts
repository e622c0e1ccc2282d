import "dotenv/config";
import { createSyncContext, loadConfig } from "@ordersync/core";
import { EXIT_CODES } from "@ordersync/types";
import { USAGE, parseCliArgs } from "./cli-args";
import { describeFailure, exitCodeFor } from "./exit-code";
import { runCheckConnectionsJob } from "./jobs/check-connections.job";
import { runSyncOrdersJob } from "./jobs/sync-orders.job";

async function main(argv: string[]): Promise<number> {
  const options = parseCliArgs(argv);
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const ctx = createSyncContext(loadConfig(process.env));

  if (options.check) {
    const results = await runCheckConnectionsJob(ctx);
    return results.every((r) => r.ok) ? 0 : EXIT_CODES.CONNECTION;
  }

  await runSyncOrdersJob(ctx, options);
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(`[sync-orders] ${describeFailure(err)}`);
    process.exit(exitCodeFor(err));
  }
);
