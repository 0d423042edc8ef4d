import { z } from 'zod';

export interface ToolDef {
  name: string;
  description: string;
  inputSchema: z.ZodTypeAny;
}

export const RUN_TEST_TOOL = 'run_test';

export const runTestInput = z.object({
  file: z.string().describe('Path to the RSpec file to run; must end in _spec.rb, e.g. spec/models/user_spec.rb'),
  line_numbers: z
    .array(z.number().int())
    .optional()
    .describe('Positive line numbers selecting individual examples, e.g. [37, 87]'),
});

const tools: ToolDef[] = [
  {
    name: RUN_TEST_TOOL,
    description:
      'Run an RSpec test file with the configured runner command and return its exit code, stdout and stderr. ' +
      'A failing run is still a successful call: check the exit code in the report.',
    inputSchema: runTestInput,
  },
];

export class ToolRegistry {
  getAllTools(): ToolDef[] {
    return [...tools];
  }
}
