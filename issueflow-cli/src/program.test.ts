import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createProgram, VERSION } from './program.js';

// Command instances are module singletons; build the program once.
const program = createProgram();

const subcommandNames = (name: string): string[] =>
  program.commands.find((command) => command.name() === name)?.commands.map((command) => command.name()) ?? [];

describe('createProgram', () => {
  it('registers every top-level command', () => {
    assert.deepStrictEqual(
      program.commands.map((command) => command.name()),
      [
        'create-issue',
        'update-field',
        'status',
        'audit',
        'comment',
        'open-prs',
        'work',
        'monitor',
        'keepalive',
        'setup',
        'config',
        'help-config',
      ]
    );
  });

  it('groups the work lifecycle, audits, comments and keepalive', () => {
    assert.deepStrictEqual(subcommandNames('work'), ['start', 'continue', 'review', 'done']);
    assert.deepStrictEqual(subcommandNames('audit'), ['issues', 'prs']);
    assert.deepStrictEqual(subcommandNames('comment'), ['add', 'list']);
    assert.deepStrictEqual(subcommandNames('keepalive'), ['run', 'start', 'stop', 'status']);
  });

  it('accepts the global options', () => {
    const flags = program.options.map((option) => option.long);
    assert.deepStrictEqual(flags, ['--version', '--config', '--json', '--verbose']);
  });

  it('prints the version', () => {
    const written: string[] = [];
    program.exitOverride();
    program.configureOutput({ writeOut: (text) => written.push(text) });

    assert.throws(() => program.parse(['--version'], { from: 'user' }), { code: 'commander.version' });
    assert.deepStrictEqual(written, [`${VERSION}\n`]);
  });
});
