import { Command, InvalidArgumentError, Option } from 'commander';
import { CommandContext } from '../commands/context';
import { initiate } from '../commands/initiate';
import { addRecord } from '../commands/add';
import { listRecords } from '../commands/list';
import { deleteRecord } from '../commands/delete';
import { plotRecords } from '../commands/plot';
import { ImageOpener } from '../charts/viewer';
import { SORT_COLUMNS, SortColumn } from '../storage/database';
import { resolveDate } from '../utils/dates';
import { parseTemperature } from '../utils/helpers';

export interface ProgramOptions {
  opener?: ImageOpener;
  // throw CommanderError instead of exiting, and keep usage errors off stderr
  exitOverride?: boolean;
}

interface AddFlags {
  morning?: number | null;
  evening?: number | null;
  date?: string;
}

interface ListFlags {
  sort: SortColumn;
  asc?: boolean;
  export?: string;
}

interface DateFlags {
  date?: string;
}

interface PlotFlags {
  save?: boolean;
}

function asArgParser<T>(parse: (value: string) => T): (value: string) => T {
  return (value) => {
    try {
      return parse(value);
    } catch (error) {
      throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
    }
  };
}

const parseTemperatureArg = asArgParser(parseTemperature);
const parseDateArg = asArgParser((value: string) => resolveDate(value));

export function buildProgram(ctx: CommandContext, options: ProgramOptions = {}): Command {
  const program = new Command();

  if (options.exitOverride) {
    program.exitOverride().configureOutput({ writeErr: () => undefined });
  }

  program
    .name('temperature-log')
    .description('Record and chart daily morning/evening body temperatures')
    .version('1.0.0');

  program
    .command('initiate')
    .description('create the temperature table')
    .action(() => {
      initiate(ctx);
    });

  program
    .command('add')
    .description('record the morning and evening temperature for a day')
    .argument('[morning]', 'morning temperature ("-" when not taken)')
    .argument('[evening]', 'evening temperature ("-" when not taken)')
    .argument('[date]', 'YYYY-MM-DD or <N>d for N days ago (default: today)')
    .option('-m, --morning <value>', 'morning temperature', parseTemperatureArg)
    .option('-e, --evening <value>', 'evening temperature', parseTemperatureArg)
    .option('-d, --date <date>', 'YYYY-MM-DD or <N>d for N days ago', parseDateArg)
    .addHelpText('after', '\nWith --morning or --evening the only argument taken is the date.')
    .action(function (
      this: Command,
      morning: string | undefined,
      evening: string | undefined,
      date: string | undefined,
      flags: AddFlags
    ) {
      const parse = <T>(fn: () => T): T => {
        try {
          return fn();
        } catch (error) {
          return this.error(`error: ${error instanceof Error ? error.message : String(error)}`);
        }
      };

      const positional = [morning, evening, date].filter((v): v is string => v !== undefined);
      const byOption = flags.morning !== undefined || flags.evening !== undefined;
      if (byOption && positional.length > 1) {
        this.error('error: with --morning or --evening give at most a date as argument');
      }

      const morningText = byOption ? undefined : morning;
      const eveningText = byOption ? undefined : evening;
      const dateText = flags.date ?? (byOption ? positional[0] : date);

      const temperature = (option: number | null | undefined, text: string | undefined): number | null => {
        if (option !== undefined) return option;
        return text === undefined ? null : parse(() => parseTemperature(text));
      };

      const morningValue = temperature(flags.morning, morningText);
      const eveningValue = temperature(flags.evening, eveningText);
      const resolvedDate = dateText === undefined ? undefined : parse(() => resolveDate(dateText));

      if (morningValue === null && eveningValue === null) {
        this.error('error: give at least a morning or an evening temperature');
      }
      addRecord(ctx, { morning: morningValue, evening: eveningValue, date: resolvedDate });
    });

  program
    .command('list')
    .description('print every record, or export them to a file')
    .addOption(
      new Option('-s, --sort <column>', 'column to sort by').choices(SORT_COLUMNS).default('date')
    )
    .option('-a, --asc', 'sort ascending (default: descending)')
    .option('-x, --export <file>', 'write a semicolon-delimited file instead of printing')
    .action((flags: ListFlags) => {
      listRecords(ctx, {
        sort: flags.sort,
        direction: flags.asc ? 'asc' : 'desc',
        exportPath: flags.export,
      });
    });

  program
    .command('delete')
    .description('delete the record for a day')
    .argument('[date]', 'YYYY-MM-DD or <N>d for N days ago (default: today)', parseDateArg)
    .option('-d, --date <date>', 'YYYY-MM-DD or <N>d for N days ago', parseDateArg)
    .action((date: string | undefined, flags: DateFlags) => {
      deleteRecord(ctx, { date: flags.date ?? date });
    });

  program
    .command('plot')
    .description('chart morning and evening temperatures by date')
    .option('-s, --save', 'save a PNG instead of opening a viewer')
    .action(async (flags: PlotFlags) => {
      await plotRecords(ctx, { save: flags.save, opener: options.opener });
    });

  return program;
}
