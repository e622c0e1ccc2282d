import { parseArgs } from "util";
import { ValidationError, errorMessage } from "@ordersync/core";

export interface CliOptions {
  fromDate?: string;
  toDate?: string;
  parallel: boolean;
  check: boolean;
  help: boolean;
}

export const USAGE = `Usage: npm run sync -- [options]

Append one row of order totals for a date range to the ledger spreadsheet.

Options:
  --from-date <YYYY-MM-DD>  first day of the range (default: today)
  --to-date <YYYY-MM-DD>    last day of the range, inclusive (default: --from-date)
  --parallel                query both databases at the same time
  --check                   test both databases and the spreadsheet, append nothing
  -h, --help                show this message

A multi-day range is labelled "<from>..<to>". Running twice appends twice.`;

export function parseCliArgs(argv: string[]): CliOptions {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        "from-date": { type: "string" },
        "to-date": { type: "string" },
        parallel: { type: "boolean" },
        check: { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
      strict: true,
      allowPositionals: false,
    });

    return {
      fromDate: values["from-date"],
      toDate: values["to-date"],
      parallel: values.parallel ?? false,
      check: values.check ?? false,
      help: values.help ?? false,
    };
  } catch (err) {
    throw new ValidationError({ message: errorMessage(err), cause: err });
  }
}
