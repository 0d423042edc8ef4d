import type { ProcessOutcome } from '../execution/types.js';

export function formatReport(targetDescription: string, outcome: ProcessOutcome): string {
  return [
    `Test file: ${targetDescription}`,
    `Exit Code: ${outcome.exitCode}`,
    '',
    'STDOUT:',
    outcome.stdout,
    '',
    'STDERR:',
    outcome.stderr,
  ].join('\n');
}
