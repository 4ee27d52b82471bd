import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseRequirement, parseRequirements } from '../../../src/core/build/requirement-parser.js';
import { parseWheelFilename } from '../../../src/core/build/wheel-filename.js';

describe('parseRequirement', () => {
  it('keeps the name and minimum version', () => {
    assert.deepEqual(parseRequirement('httpx>=0.27'), { name: 'httpx', versionConstraint: '0.27', preferredChannel: 'index' });
  });

  it('drops extras, upper bounds and markers', () => {
    assert.deepEqual(
      parseRequirement('httpx[http2] >=0.27, <1; python_version > "3.9"'),
      { name: 'httpx', versionConstraint: '0.27', preferredChannel: 'index' }
    );
  });

  it('takes the highest of several minimums and strips wildcards', () => {
    assert.deepEqual(parseRequirement('rich>=12,~=13.7'), { name: 'rich', versionConstraint: '13.7', preferredChannel: 'index' });
    assert.deepEqual(parseRequirement('typer==0.9.*'), { name: 'typer', versionConstraint: '0.9', preferredChannel: 'index' });
  });

  it('reads parenthesized constraints', () => {
    assert.deepEqual(parseRequirement('mcp (>=1.2)'), { name: 'mcp', versionConstraint: '1.2', preferredChannel: 'index' });
  });

  it('ignores versions of direct references', () => {
    assert.deepEqual(parseRequirement('tool @ https://example.invalid/tool-1.0.tar.gz'), { name: 'tool', preferredChannel: 'index' });
  });

  it('returns no version for upper bounds only', () => {
    assert.deepEqual(parseRequirement('pydantic<3'), { name: 'pydantic', preferredChannel: 'index' });
  });

  it('returns null for blank or unparseable entries', () => {
    assert.equal(parseRequirement('  ; sys_platform == "win32"'), null);
    assert.equal(parseRequirement('>=1.0'), null);
  });
});

describe('parseRequirements', () => {
  it('skips entries that cannot be parsed', () => {
    assert.deepEqual(parseRequirements(['httpx', '', 'rich>=13']), [
      { name: 'httpx', preferredChannel: 'index' },
      { name: 'rich', versionConstraint: '13', preferredChannel: 'index' }
    ]);
  });
});

describe('parseWheelFilename', () => {
  it('reads distribution and version', () => {
    assert.deepEqual(parseWheelFilename('demo_app-0.3.0-py3-none-any.whl'), {
      name: 'demo_app',
      version: '0.3.0',
      fileName: 'demo_app-0.3.0-py3-none-any.whl'
    });
  });

  it('accepts a build tag', () => {
    assert.equal(parseWheelFilename('demo_app-0.3.0-1-py3-none-any.whl')?.version, '0.3.0');
  });

  it('rejects other files', () => {
    assert.equal(parseWheelFilename('demo_app-0.3.0.tar.gz'), null);
    assert.equal(parseWheelFilename('demo_app-0.3.0-any.whl'), null);
  });
});
