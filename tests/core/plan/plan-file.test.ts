import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';
import { loadPlan, parsePlanDocument, savePlan, serializePlan } from '../../../src/core/plan/plan-file.js';
import { describeAction, displayPlan } from '../../../src/core/plan/plan-reporting.js';
import { createRecordingOutput } from '../../../src/core/ports/console-output.js';
import { ValidationError } from '../../../src/utils/errors.js';
import type { InstallPlan } from '../../../src/types/index.js';
import { createTempDir, removeTempDir, writeFile } from '../../test-helpers.js';

const plan: InstallPlan = {
  packageName: 'demo-app',
  actions: [
    {
      channel: 'LocalArtifactInstall',
      artifact: {
        name: 'demo-app',
        version: '0.3.0',
        path: '/work/app/dist/demo_app-0.3.0-py3-none-any.whl',
        role: 'primary',
        sourceDir: '/work/app',
        declaredDependencies: [{ name: 'httpx', versionConstraint: '0.27', preferredChannel: 'index' }]
      },
      role: 'primary',
      dependencyMode: 'skip',
      dependenciesRouted: true
    },
    { channel: 'IndexInstall', dependency: { name: 'httpx', versionConstraint: '0.27', preferredChannel: 'index' } }
  ],
  hostManaged: [{ name: 'PyQt6', preferredChannel: 'host' }],
  assignments: [
    { name: 'pyqt6', channel: 'HostManaged' },
    { name: 'httpx', channel: 'IndexInstall' }
  ],
  warnings: ['rich: prefers host but no matching source exists; installing from the package index']
};

describe('plan files', () => {
  let dir: string;

  before(async () => {
    dir = await createTempDir('plan');
  });

  after(async () => {
    await removeTempDir(dir);
  });

  it('saves and loads a plan', async () => {
    const path = join(dir, 'nested', 'plan.json');
    await savePlan(path, plan);

    assert.deepEqual(await loadPlan(path), plan);
  });

  it('returns a frozen plan', () => {
    const loaded = parsePlanDocument(JSON.parse(serializePlan(plan)));

    assert.equal(Object.isFrozen(loaded), true);
    assert.equal(Object.isFrozen(loaded.actions), true);
    assert.equal(Object.isFrozen(loaded.actions[0]), true);
    assert.equal(Object.isFrozen(loaded.hostManaged[0]), true);
    assert.equal(Object.isFrozen(plan), false);
  });

  it('writes a versioned JSON document', () => {
    const text = serializePlan(plan);

    assert.equal(text.endsWith('}\n'), true);
    assert.equal(JSON.parse(text).formatVersion, 1);
  });

  it('rejects an unknown format version', () => {
    assert.throws(
      () => parsePlanDocument({ formatVersion: 2, plan }),
      { message: 'Validation error: plan file: unsupported format (expected formatVersion 1)' }
    );
  });

  it('rejects an action with an unknown channel', () => {
    const document = { formatVersion: 1, plan: { ...plan, actions: [{ channel: 'HostManaged' }] } };

    assert.throws(
      () => parsePlanDocument(document),
      { message: 'Validation error: plan file: plan.actions[0].channel must be IndexInstall or LocalArtifactInstall' }
    );
  });

  it('rejects a local action without a dependency mode', () => {
    const [local] = plan.actions;
    const document = { formatVersion: 1, plan: { ...plan, actions: [{ ...local, dependencyMode: 'some' }] } };

    assert.throws(
      () => parsePlanDocument(document),
      { message: 'Validation error: plan file: plan.actions[0].dependencyMode is invalid' }
    );
  });

  it('reports malformed JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ "formatVersion": 1,');

    await assert.rejects(loadPlan(path), (error: unknown) =>
      error instanceof ValidationError && error.message.startsWith(`Validation error: plan file ${path} is not valid JSON: `)
    );
  });
});

describe('plan reporting', () => {
  it('describes each action on one line', () => {
    assert.deepEqual(plan.actions.map(describeAction), [
      'LocalArtifactInstall demo-app 0.3.0 (primary, no deps)',
      'IndexInstall httpx>=0.27'
    ]);
  });

  it('prints actions, host-managed names and warnings', () => {
    const output = createRecordingOutput();
    displayPlan(plan, output);

    assert.deepEqual(output.lines, [
      { level: 'step', text: 'Install plan for demo-app' },
      { level: 'message', text: '  ├── LocalArtifactInstall demo-app 0.3.0 (primary, no deps)' },
      { level: 'message', text: '  └── IndexInstall httpx>=0.27' },
      { level: 'info', text: 'HostManaged (not executed): PyQt6' },
      { level: 'warn', text: 'rich: prefers host but no matching source exists; installing from the package index' }
    ]);
  });
});
