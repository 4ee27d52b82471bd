import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { diagnosticOutput, failureResult } from '../../../src/core/tools/tool-runner.js';

describe('failureResult', () => {
  it('reports a kill by the timer as a timeout', () => {
    const result = failureResult({ message: 'The operation was aborted', code: 'ABORT_ERR', stdout: 'partial\n' }, true);

    assert.deepEqual(result, { exitCode: 124, stdout: 'partial\n', stderr: '', timedOut: true });
  });

  it('passes the exit code of a process that ran through', () => {
    const result = failureResult({ message: 'Command failed', code: 2, stderr: 'no such option\n' }, false);

    assert.deepEqual(result, { exitCode: 2, stdout: '', stderr: 'no such option\n', timedOut: false });
  });

  it('maps a termination signal to 128 plus the signal number', () => {
    assert.equal(failureResult({ message: 'Command failed', code: null, signal: 'SIGKILL' }, false).exitCode, 137);
    assert.deepEqual(failureResult({ message: 'Command failed', code: null, killed: true, signal: 'SIGTERM' }, false), {
      exitCode: 143,
      stdout: '',
      stderr: 'Command failed',
      timedOut: false
    });
  });

  it('does not treat an output overflow as a timeout', () => {
    const result = failureResult(
      { message: 'stdout maxBuffer length exceeded', code: 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER', killed: true, signal: 'SIGTERM' },
      false
    );

    assert.equal(result.exitCode, 143);
    assert.equal(result.timedOut, false);
    assert.equal(result.stderr, 'stdout maxBuffer length exceeded');
  });

  it('reports a command that cannot start with exit code 127', () => {
    const result = failureResult({ message: 'spawn fake-pip ENOENT', code: 'ENOENT' }, false);

    assert.deepEqual(result, { exitCode: 127, stdout: '', stderr: 'spawn fake-pip ENOENT', timedOut: false });
  });
});

describe('diagnosticOutput', () => {
  it('joins trimmed stderr and stdout, skipping empty streams', () => {
    assert.equal(diagnosticOutput({ exitCode: 1, stdout: '\n', stderr: ' boom \n', timedOut: false }), 'boom');
    assert.equal(diagnosticOutput({ exitCode: 1, stdout: 'out', stderr: 'err', timedOut: false }), 'err\nout');
  });
});
