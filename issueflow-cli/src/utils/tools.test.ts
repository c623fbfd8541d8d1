import { describe, it } from 'node:test';
import assert from 'node:assert';
import { requireTool, toolMissingError, type CommandRunner } from './tools.js';
import { ErrorCode } from './errors.js';

const runner = (available: string[]): CommandRunner => ({
  run: () => '',
  exists: (command) => available.includes(command),
});

describe('toolMissingError', () => {
  it('names the tool, the reason and the install hint', () => {
    const error = toolMissingError('gcloud', 'token method "gcloud"');
    assert.strictEqual(error.code, ErrorCode.ENV_TOOL_MISSING);
    assert.strictEqual(error.message, 'Required tool "gcloud" not found (token method "gcloud")');
    assert.deepStrictEqual(error.getRecoverySuggestions(), [
      'Install the Google Cloud CLI: https://cloud.google.com/sdk/docs/install',
    ]);
  });

  it('falls back to a generic hint', () => {
    assert.deepStrictEqual(toolMissingError('jq').getRecoverySuggestions(), ['Install jq and make sure it is on PATH']);
  });
});

describe('requireTool', () => {
  it('passes when the tool exists', () => {
    assert.doesNotThrow(() => requireTool(runner(['git']), 'git'));
  });

  it('throws when it does not', () => {
    assert.throws(() => requireTool(runner([]), 'git'), { message: 'Required tool "git" not found' });
  });
});
