import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';
import { buildArtifacts, getBuildSources } from '../../../src/core/build/artifact-builder.js';
import { getArtifactIndexPath, readArtifactIndex } from '../../../src/core/build/artifact-index.js';
import { parseRecipeYml } from '../../../src/core/recipe/recipe-yml.js';
import { createRecordingOutput } from '../../../src/core/ports/console-output.js';
import { BuildFailureError } from '../../../src/utils/errors.js';
import { exists } from '../../../src/utils/fs.js';
import type { Recipe } from '../../../src/types/index.js';
import {
  createProjectFixture,
  FakeToolRunner,
  PRIMARY_WHEEL,
  removeTempDir,
  SUBPROJECT_WHEEL,
  writeFile,
  type ProjectFixture
} from '../../test-helpers.js';

describe('buildArtifacts', () => {
  let fixture: ProjectFixture & { runner: FakeToolRunner };
  let recipe: Recipe;

  beforeEach(async () => {
    fixture = await createProjectFixture();
    recipe = await parseRecipeYml(fixture.recipePath);
  });

  afterEach(async () => {
    await removeTempDir(fixture.baseDir);
  });

  it('lists the primary project before subprojects', () => {
    assert.deepEqual(getBuildSources(recipe), [
      { sourceDir: fixture.appDir, role: 'primary', dependencyMode: 'skip' },
      { sourceDir: fixture.subprojectDir, role: 'subproject', dependencyMode: 'skip' }
    ]);
  });

  it('builds one wheel per source and records them', async () => {
    const { artifacts, warnings } = await buildArtifacts({ recipe, runner: fixture.runner, output: createRecordingOutput() });

    assert.deepEqual(warnings, []);
    assert.deepEqual(artifacts, [
      {
        name: 'demo-app',
        version: '0.3.0',
        path: join(fixture.outDir, PRIMARY_WHEEL),
        role: 'primary',
        sourceDir: fixture.appDir,
        declaredDependencies: [
          { name: 'PyQt6', versionConstraint: '6.5', preferredChannel: 'index' },
          { name: 'httpx', versionConstraint: '0.27', preferredChannel: 'index' },
          { name: 'ollmcp-client', preferredChannel: 'index' }
        ]
      },
      {
        name: 'ollmcp-client',
        version: '0.1.2',
        path: join(fixture.outDir, SUBPROJECT_WHEEL),
        role: 'subproject',
        sourceDir: fixture.subprojectDir,
        declaredDependencies: [{ name: 'httpx', versionConstraint: '0.25', preferredChannel: 'index' }]
      }
    ]);

    assert.deepEqual((await fs.readdir(fixture.outDir)).sort(), [PRIMARY_WHEEL, SUBPROJECT_WHEEL, 'wheelstage-artifacts.yml']);
    assert.deepEqual(await readArtifactIndex(fixture.outDir), artifacts);
  });

  it('runs the build tool in each source tree with a scratch output directory', async () => {
    await buildArtifacts({ recipe, runner: fixture.runner, output: createRecordingOutput() });

    assert.deepEqual(
      fixture.runner.invocations.map(invocation => ({ command: invocation.command, args: invocation.args, cwd: invocation.cwd })),
      [
        { command: 'fake-build', args: [join(fixture.outDir, '.partial-0'), fixture.appDir], cwd: fixture.appDir },
        { command: 'fake-build', args: [join(fixture.outDir, '.partial-1'), fixture.subprojectDir], cwd: fixture.subprojectDir }
      ]
    );
  });

  it('replaces wheels of the same distribution from earlier builds', async () => {
    await writeFile(join(fixture.outDir, 'demo_app-0.2.0-py3-none-any.whl'), 'old\n');

    await buildArtifacts({ recipe, runner: fixture.runner, output: createRecordingOutput() });

    assert.equal(await exists(join(fixture.outDir, 'demo_app-0.2.0-py3-none-any.whl')), false);
    assert.equal(await exists(join(fixture.outDir, PRIMARY_WHEEL)), true);
  });

  it('propagates the build tool exit code and leaves no partial output', async () => {
    fixture.runner.builds.set(fixture.subprojectDir, { exitCode: 3, stderr: 'error: invalid pyproject\n' });

    await assert.rejects(
      buildArtifacts({ recipe, runner: fixture.runner, output: createRecordingOutput() }),
      (error: unknown) =>
        error instanceof BuildFailureError &&
        error.exitCode === 3 &&
        error.stage === 'build' &&
        error.message === `Build of ${fixture.subprojectDir} failed with exit code 3\nerror: invalid pyproject`
    );

    assert.equal(await exists(join(fixture.outDir, '.partial-1')), false);
    assert.equal(await exists(getArtifactIndexPath(fixture.outDir)), false);
  });

  it('drops the previous build record when a rebuild fails', async () => {
    await buildArtifacts({ recipe, runner: fixture.runner, output: createRecordingOutput() });
    fixture.runner.builds.set(fixture.subprojectDir, { exitCode: 2 });

    await assert.rejects(buildArtifacts({ recipe, runner: fixture.runner, output: createRecordingOutput() }), BuildFailureError);

    const indexPath = getArtifactIndexPath(fixture.outDir);
    assert.equal(await exists(indexPath), false);
    await assert.rejects(readArtifactIndex(fixture.outDir), {
      message: `No build record at ${indexPath}; run 'wheelstage build' first`
    });
  });

  it('reports a timeout with exit code 124', async () => {
    fixture.runner.builds.set(fixture.appDir, { timedOut: true });

    await assert.rejects(
      buildArtifacts({ recipe, runner: fixture.runner, output: createRecordingOutput() }),
      (error: unknown) =>
        error instanceof BuildFailureError &&
        error.exitCode === 124 &&
        error.message === `Build of ${fixture.appDir} timed out after 5000ms`
    );
  });

  it('fails before building anything when a source has no manifest', async () => {
    await fs.rm(join(fixture.subprojectDir, 'pyproject.toml'));

    await assert.rejects(
      buildArtifacts({ recipe, runner: fixture.runner, output: createRecordingOutput() }),
      {
        message: `No recognized project manifest (pyproject.toml, setup.py, setup.cfg) in ${fixture.subprojectDir}`
      }
    );
    assert.equal(fixture.runner.invocations.length, 0);
  });

  it('requires exactly one wheel per build', async () => {
    fixture.runner.builds.set(fixture.appDir, { wheels: [PRIMARY_WHEEL, 'demo_app-0.3.0-cp312-cp312-linux_x86_64.whl'] });

    await assert.rejects(
      buildArtifacts({ recipe, runner: fixture.runner, output: createRecordingOutput() }),
      { message: `Build of ${fixture.appDir} produced 2 wheels; expected exactly one` }
    );
    assert.equal(await exists(join(fixture.outDir, '.partial-0')), false);
  });

  it('warns when a manifest declares no readable dependencies', async () => {
    await fs.rm(join(fixture.subprojectDir, 'pyproject.toml'));
    await writeFile(join(fixture.subprojectDir, 'setup.py'), 'from setuptools import setup\nsetup()\n');

    const { artifacts, warnings } = await buildArtifacts({ recipe, runner: fixture.runner, output: createRecordingOutput() });

    assert.equal(artifacts[1].name, 'ollmcp_client');
    assert.deepEqual(artifacts[1].declaredDependencies, []);
    assert.deepEqual(warnings, [
      {
        stage: 'build',
        kind: 'ManifestWithoutMetadata',
        subject: 'ollmcp_client',
        message: 'Dependencies of ollmcp_client cannot be read from setup.py; declare them in the recipe'
      }
    ]);
  });
});
