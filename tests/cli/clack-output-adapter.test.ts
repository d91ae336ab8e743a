import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';

import { createPlainOutput, highlightAlertLines } from '../../src/cli/clack-output-adapter.js';

afterEach(() => {
  mock.restoreAll();
});

describe('highlightAlertLines', () => {
  it('styles non-empty lines and leaves spacers plain', () => {
    assert.deepEqual(highlightAlertLines(['', ' Heads up ', '']), ['', '\x1b[37;41m Heads up \x1b[0m', '']);
  });
});

describe('createPlainOutput', () => {
  it('prints alert blocks to stderr without escape codes', () => {
    const printed = mock.method(console, 'error', () => undefined);

    createPlainOutput().alert(['', ' Heads up ', '']);

    assert.equal(printed.mock.callCount(), 1);
    assert.deepEqual(printed.mock.calls[0].arguments, ['\n Heads up \n']);
  });
});
