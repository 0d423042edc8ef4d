import { runTestInput, ToolRegistry } from '../../src/tool-registry.js';

describe('ToolRegistry', () => {
  it('exposes exactly the run_test tool', () => {
    const names = new ToolRegistry().getAllTools().map(t => t.name);
    expect(names).toEqual(['run_test']);
  });

  it('returns a copy of the tool list', () => {
    const registry = new ToolRegistry();
    registry.getAllTools().pop();
    expect(registry.getAllTools()).toHaveLength(1);
  });
});

describe('runTestInput', () => {
  it('accepts a file with optional line numbers', () => {
    expect(runTestInput.parse({ file: 'spec/a_spec.rb' })).toEqual({ file: 'spec/a_spec.rb' });
    expect(runTestInput.parse({ file: 'spec/a_spec.rb', line_numbers: [3, 9] })).toEqual({
      file: 'spec/a_spec.rb',
      line_numbers: [3, 9],
    });
  });

  it('leaves positivity to the validator', () => {
    expect(runTestInput.safeParse({ file: 'spec/a_spec.rb', line_numbers: [-1] }).success).toBe(true);
  });

  it('rejects non-integer line numbers', () => {
    expect(runTestInput.safeParse({ file: 'spec/a_spec.rb', line_numbers: [2.5] }).success).toBe(false);
  });
});
