import { AllocationService } from '../services/allocation.service';
import { AppError } from '../types/error.types';
import { AllocationReport } from '../types/bouquet.types';

export interface CliOptions {
  test: boolean;
}

export interface CliIo {
  lines: AsyncIterator<string>;
  write: (text: string) => void;
  writeError: (text: string) => void;
}

/**
 * Parse `--test y`, `--test=y` (or n). Anything else is ignored.
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  let value = 'n';

  argv.forEach((arg, index) => {
    if (arg.startsWith('--test=')) {
      value = arg.slice('--test='.length);
    } else if (arg === '--test') {
      value = argv[index + 1] ?? 'y';
    }
  });

  return { test: value.trim().toLowerCase() === 'y' };
}

/**
 * Read lines until an empty one or end of input
 */
export async function readSection(lines: AsyncIterator<string>): Promise<string[]> {
  const section: string[] = [];

  for (;;) {
    const next = await lines.next();
    if (next.done) break;

    const line = next.value.trim();
    if (!line) break;
    section.push(line);
  }

  return section;
}

/**
 * Prompt for designs then flowers (or use the sample data), allocate and
 * print the completed bouquets
 *
 * @returns the process exit code
 */
export async function runCli(
  options: CliOptions,
  io: CliIo,
  service: AllocationService = new AllocationService()
): Promise<number> {
  try {
    let report: AllocationReport;
    if (options.test) {
      report = service.allocateSample();
    } else {
      io.write('Please enter bouquet designs:\n');
      const designs = await readSection(io.lines);
      io.write('Please enter flowers:\n');
      const flowers = await readSection(io.lines);
      report = service.allocateText(designs, flowers);
    }

    io.write('\nResult:\n');
    for (const bouquet of report.completed) {
      io.write(`${bouquet}\n`);
    }
    return 0;
  } catch (error) {
    if (error instanceof AppError && error.statusCode < 500) {
      io.writeError(`${error.message}\n`);
      return 1;
    }
    throw error;
  }
}
