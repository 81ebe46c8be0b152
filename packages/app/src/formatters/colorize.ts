/**
 * Terminal colours for the text report
 */

import chalk from 'chalk';

/**
 * Colours insight markers and notices in the text report
 */
export function colorizeReport(output: string): string {
  return output
    .split('\n')
    .map((line) => {
      const trimmed = line.trimStart();
      if (trimmed.startsWith('[+]')) return chalk.green(line);
      if (trimmed.startsWith('[-]')) return chalk.red(line);
      if (trimmed.startsWith('[=]')) return chalk.gray(line);
      if (trimmed.startsWith('[!]')) return chalk.yellow(line);
      return line;
    })
    .join('\n');
}
