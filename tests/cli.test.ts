import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { createProgram } from '../src/program.js';
import { parsePositiveInt, parseSizeList } from '../src/commands/options.js';

describe('CLI', () => {
  it('registers the sub-commands', () => {
    const program = createProgram();
    expect(program.name()).toBe('boxpack');
    expect(program.commands.map(c => c.name())).toEqual(['init', 'pack', 'bench']);
  });

  it('shows help', () => {
    const help = createProgram().helpInformation();
    expect(help).toContain('boxpack');
    expect(help).toContain('pack');
    expect(help).toContain('bench');
  });
});

describe('Option parsers', () => {
  it('parses positive integers', () => {
    expect(parsePositiveInt('3')).toBe(3);
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('2.5')).toThrow(InvalidArgumentError);
  });

  it('parses size lists', () => {
    expect(parseSizeList('35, 350,3500')).toEqual([35, 350, 3500]);
    expect(() => parseSizeList('10,x')).toThrow(InvalidArgumentError);
  });
});
