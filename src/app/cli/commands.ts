/**
 * CLI command definitions
 *
 * Default action (slugify), approximate, locales.
 */

import { approximateTexts, listLocaleSummaries, slugifyTexts } from '../../features/slug/index.js';
import { debug, status, warn } from '../../shared/ui/index.js';
import { readLines } from '../../shared/utils/stdin.js';
import { program, cliSettings } from './program.js';
import { unknownLocaleWarning } from './helpers.js';

async function resolveInputs(texts: string[]): Promise<string[]> {
  if (texts.length > 0) {
    return texts;
  }
  if (process.stdin.isTTY) {
    warn('No text given. Pass text as arguments or pipe it on stdin.');
    return [];
  }
  const lines = await readLines(process.stdin);
  debug(`Read ${lines.length} line(s) from stdin`);
  return lines;
}

function warnUnknownLocale(locale: string | undefined): void {
  const message = unknownLocaleWarning(locale);
  if (message) {
    warn(message);
  }
}

program
  .argument('[text...]', 'Text to convert; one slug per argument (stdin lines when omitted)')
  .action(async (texts: string[]) => {
    const inputs = await resolveInputs(texts);
    if (cliSettings.ascii) {
      warnUnknownLocale(cliSettings.locale);
    }
    for (const slug of slugifyTexts(inputs, cliSettings)) {
      console.log(slug);
    }
  });

program
  .command('approximate')
  .description('Replace accented letters with ASCII look-alikes, nothing else')
  .argument('[text...]', 'Text to approximate (stdin lines when omitted)')
  .action(async (texts: string[]) => {
    const inputs = await resolveInputs(texts);
    warnUnknownLocale(cliSettings.locale);
    for (const line of approximateTexts(inputs, cliSettings.locale)) {
      console.log(line);
    }
  });

program
  .command('locales')
  .description('List approximation tables')
  .action(() => {
    for (const summary of listLocaleSummaries()) {
      const label = summary.isDefault ? `${summary.locale} (default)` : summary.locale;
      status(label, `${summary.entries} entries`, summary.isDefault ? 'green' : undefined);
    }
  });
