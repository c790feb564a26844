import { Command } from 'commander';

export type CliOptions = {
  headless: boolean;
};

/** Anything but a case-insensitive "false" keeps the browser headless. */
export function parseHeadless(value: string): boolean {
  return value.toLowerCase() !== 'false';
}

export function buildProgram(): Command {
  return new Command()
    .name('directory-scraper')
    .description('Scrape realtor contacts from a directory page and append them to a Google Sheet')
    .option('--headless <value>', 'run the fallback browser headless ("false" to show it)', parseHeadless, true);
}

export function parseArgs(argv: string[]): CliOptions {
  const program = buildProgram().parse(argv);
  const { headless } = program.opts<CliOptions>();
  return { headless };
}
