import { describe, expect, it } from 'vitest';
import { CommanderError } from 'commander';
import { VERSION, createProgram } from './program.js';

function captured() {
  const program = createProgram();
  const out: string[] = [];
  const err: string[] = [];
  program.configureOutput({
    writeOut: (text) => out.push(text),
    writeErr: (text) => err.push(text),
  });
  return { program, out, err };
}

describe('createProgram', () => {
  it('registers every command', () => {
    expect(createProgram().commands.map((command) => command.name())).toEqual([
      'run',
      'images',
      'generate-cases',
      'devices',
      'doctor',
    ]);
  });

  it('prints the version instead of exiting', async () => {
    const { program, out } = captured();

    await expect(program.parseAsync(['node', 'scanprobe', '--version'])).rejects.toMatchObject({
      code: 'commander.version',
      exitCode: 0,
    });
    expect(out).toEqual([`${VERSION}\n`]);
  });

  it('rejects unknown commands with a non-zero exit code', async () => {
    const { program, err } = captured();

    const parse = program.parseAsync(['node', 'scanprobe', 'launch']);

    await expect(parse).rejects.toBeInstanceOf(CommanderError);
    await expect(parse).rejects.toMatchObject({ code: 'commander.unknownCommand', exitCode: 1 });
    expect(err.join('')).toContain("unknown command 'launch'");
  });

  it('exposes the run options', () => {
    const run = createProgram().commands.find((command) => command.name() === 'run');

    expect(run?.options.map((option) => option.long)).toEqual([
      '--test-id',
      '--type',
      '--manual',
      '--upload',
      '--config',
      '--device',
      '--verbose',
    ]);
  });
});
