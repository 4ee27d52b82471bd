import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';
import { runStagePipeline } from '../../../src/core/pipeline/stage-pipeline.js';
import { parseRecipeYml } from '../../../src/core/recipe/recipe-yml.js';
import { createRecordingOutput } from '../../../src/core/ports/console-output.js';
import { BuildFailureError, ClassificationConflictError } from '../../../src/utils/errors.js';
import { exists } from '../../../src/utils/fs.js';
import {
  createProjectFixture,
  FakeToolRunner,
  FIXTURE_RECIPE,
  removeTempDir,
  walkFiles,
  writeFile,
  type ProjectFixture
} from '../../test-helpers.js';

const STAGED_FILES = [
  'usr/lib/fake-installs/demo_app-0.3.0-py3-none-any.whl.record',
  'usr/lib/fake-installs/httpx>=0.27.record',
  'usr/lib/fake-installs/ollmcp_client-0.1.2-py3-none-any.whl.record',
  'usr/share/applications/demo-app.desktop',
  'usr/share/pixmaps/demo-app.png'
];

describe('runStagePipeline', () => {
  let fixture: ProjectFixture & { runner: FakeToolRunner };

  beforeEach(async () => {
    fixture = await createProjectFixture();
  });

  afterEach(async () => {
    await removeTempDir(fixture.baseDir);
  });

  async function stage(root: string, output = createRecordingOutput()) {
    const recipe = await parseRecipeYml(fixture.recipePath);
    return runStagePipeline({ recipe, stagingRoot: root, runner: fixture.runner, output });
  }

  it('builds, installs each channel once and places assets', async () => {
    const root = join(fixture.baseDir, 'root');
    const output = createRecordingOutput();
    const result = await stage(root, output);

    assert.deepEqual(result.artifacts.map(artifact => artifact.name), ['demo-app', 'ollmcp-client']);
    assert.deepEqual(result.plan.hostManaged, [{ name: 'PyQt6', versionConstraint: '6.5', preferredChannel: 'host' }]);
    assert.deepEqual(result.install.installed.map(entry => entry.subject), ['demo-app', 'httpx', 'ollmcp-client']);
    assert.deepEqual(result.warnings, []);
    assert.deepEqual(await walkFiles(root), STAGED_FILES);
    assert.deepEqual(
      output.lines.filter(line => line.text.startsWith('Stage: ')).map(line => line.text),
      ['Stage: build', 'Stage: classify', 'Stage: install', 'Stage: assets']
    );
  });

  it('produces the same tree on repeated runs into fresh roots', async () => {
    const first = join(fixture.baseDir, 'first');
    const second = join(fixture.baseDir, 'second');

    await stage(first);
    await stage(second);

    const files = await walkFiles(first);
    assert.deepEqual(await walkFiles(second), files);
    const desktop = 'usr/share/applications/demo-app.desktop';
    assert.equal(await fs.readFile(join(second, desktop), 'utf8'), await fs.readFile(join(first, desktop), 'utf8'));
  });

  it('stops after a failed build without touching the staging root', async () => {
    fixture.runner.builds.set(fixture.subprojectDir, { exitCode: 3, stderr: 'error: no backend' });
    const root = join(fixture.baseDir, 'root');
    const output = createRecordingOutput();

    await assert.rejects(stage(root, output), (error: unknown) =>
      error instanceof BuildFailureError && error.exitCode === 3 && error.stage === 'build'
    );
    assert.equal(await exists(root), false);
    assert.equal(fixture.runner.installInvocations().length, 0);
    assert.equal(output.lines.some(line => line.text === 'Stage: classify'), false);
  });

  it('refuses to install when a dependency is both host-provided and bundled', async () => {
    await writeFile(
      fixture.recipePath,
      FIXTURE_RECIPE.replace('dependencies:', 'host:\n  provides: [ollmcp-client]\ndependencies:')
    );
    const root = join(fixture.baseDir, 'root');

    await assert.rejects(stage(root), (error: unknown) =>
      error instanceof ClassificationConflictError &&
      error.stage === 'classify' &&
      error.conflicts.includes('ollmcp-client')
    );
    assert.equal(await exists(root), false);
    assert.equal(fixture.runner.installInvocations().length, 0);
  });

  it('completes with a warning when the desktop entry lacks the icon line', async () => {
    await writeFile(join(fixture.appDir, 'packaging', 'demo-app.desktop'), '[Desktop Entry]\nName=Demo App\n');
    const root = join(fixture.baseDir, 'root');

    const result = await stage(root);

    assert.deepEqual(result.warnings.map(warning => warning.kind), ['AssetSubstitutionMiss']);
    assert.deepEqual(await walkFiles(root), STAGED_FILES);
  });

  it('warns when the staging root already holds files', async () => {
    const root = join(fixture.baseDir, 'root');
    await writeFile(join(root, 'leftover.txt'), 'x\n');

    const result = await stage(root);

    assert.deepEqual(result.warnings, [
      {
        stage: 'install',
        kind: 'StagingRootNotEmpty',
        subject: root,
        message: `Staging root ${root} is not empty; results may include files from an earlier run`
      }
    ]);
  });
});
