import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';
import { parseRecipeYml, validateRecipe } from '../../../src/core/recipe/recipe-yml.js';
import { ConfigError, ValidationError } from '../../../src/utils/errors.js';
import { createTempDir, removeTempDir, writeFile } from '../../test-helpers.js';

const minimal = {
  name: 'demo-app',
  version: '0.3.0',
  assets: { desktop: 'packaging/demo-app.desktop', icon: 'packaging/demo-app.png' }
};

describe('validateRecipe', () => {
  it('fills in defaults and resolves paths against the recipe directory', () => {
    const recipe = validateRecipe(minimal, '/work/app');

    assert.equal(recipe.source, '/work/app');
    assert.equal(recipe.outDir, '/work/app/dist');
    assert.equal(recipe.prefix, '/usr');
    assert.equal(recipe.primary.dependencyMode, 'skip');
    assert.deepEqual(recipe.subprojects, []);
    assert.deepEqual(recipe.hostProvides, []);
    assert.deepEqual(recipe.dependencies, []);
    assert.equal(recipe.assets.desktop, '/work/app/packaging/demo-app.desktop');
    assert.equal(recipe.assets.iconLiteral, 'Icon=/usr/share/pixmaps/mcp-central.png');
    assert.equal(recipe.tools.build.command, 'python');
    assert.deepEqual(recipe.tools.install.args, [
      '-m', 'pip', 'install', '--root={root}', '--prefix={prefix}', '--no-warn-script-location'
    ]);
    assert.equal(recipe.tools.install.noDepsFlag, '--no-deps');
    assert.equal(recipe.tools.timeoutMs, 600000);
  });

  it('reads dependency shorthand and object forms', () => {
    const recipe = validateRecipe({
      ...minimal,
      dependencies: ['httpx', { name: 'PyQt6', channel: 'host' }, { name: 'rich', version: 13 }]
    }, '/work/app');

    assert.deepEqual(recipe.dependencies, [
      { name: 'httpx', preferredChannel: 'index' },
      { name: 'PyQt6', preferredChannel: 'host' },
      { name: 'rich', versionConstraint: '13', preferredChannel: 'index' }
    ]);
  });

  it('rejects a fractional number where a version string belongs', () => {
    assert.throws(
      () => validateRecipe({ ...minimal, dependencies: [{ name: 'ollama', version: 0.4 }] }, '/work/app'),
      { message: 'Validation error: dependencies[0].version must be quoted; the number 0.4 may have lost digits' }
    );
  });

  it('reads subprojects with their dependency mode', () => {
    const recipe = validateRecipe({
      ...minimal,
      subprojects: ['vendor/a', { path: 'vendor/b', dependencyMode: 'full' }]
    }, '/work/app');

    assert.deepEqual(recipe.subprojects, [
      { path: '/work/app/vendor/a', dependencyMode: 'skip' },
      { path: '/work/app/vendor/b', dependencyMode: 'full' }
    ]);
  });

  it('normalizes the prefix', () => {
    assert.equal(validateRecipe({ ...minimal, prefix: '/opt//demo/' }, '/work/app').prefix, '/opt/demo/');
  });

  it('rejects a dependency declared twice under different spellings', () => {
    assert.throws(
      () => validateRecipe({ ...minimal, dependencies: ['Foo_Bar', 'foo-bar'] }, '/work/app'),
      (error: unknown) =>
        error instanceof ValidationError &&
        error.message === "Validation error: dependency 'foo-bar' is declared twice (also as 'Foo_Bar')"
    );
  });

  it('rejects an unknown channel', () => {
    assert.throws(
      () => validateRecipe({ ...minimal, dependencies: [{ name: 'httpx', channel: 'conda' }] }, '/work/app'),
      { message: 'Validation error: dependencies[0].channel must be one of: host, index, bundled' }
    );
  });

  it('rejects a relative prefix', () => {
    assert.throws(
      () => validateRecipe({ ...minimal, prefix: 'usr' }, '/work/app'),
      { message: "Validation error: prefix 'usr' must be an absolute path" }
    );
  });

  it('requires assets', () => {
    assert.throws(
      () => validateRecipe({ name: 'demo-app', version: '1' }, '/work/app'),
      { message: 'Validation error: assets is required and must be a mapping' }
    );
  });

  it('rejects a non-positive timeout', () => {
    assert.throws(
      () => validateRecipe({ ...minimal, tools: { timeoutMs: 0 } }, '/work/app'),
      { message: 'Validation error: tools.timeoutMs must be a positive integer' }
    );
  });
});

describe('parseRecipeYml', () => {
  let dir: string;

  before(async () => {
    dir = await createTempDir('recipe');
  });

  after(async () => {
    await removeTempDir(dir);
  });

  it('loads a recipe file', async () => {
    const path = join(dir, 'wheelstage.yml');
    await writeFile(path, [
      'name: demo-app',
      'version: 1.0',
      'host:',
      '  provides: [python3-pyqt6]',
      'assets:',
      '  desktop: demo.desktop',
      '  icon: demo.png',
      ''
    ].join('\n'));

    const recipe = await parseRecipeYml(path);
    assert.equal(recipe.version, '1.0');
    assert.deepEqual(recipe.hostProvides, ['python3-pyqt6']);
    assert.equal(recipe.recipeDir, dir);
  });

  it('keeps unquoted versions as written', async () => {
    const path = join(dir, 'versions.yml');
    await writeFile(path, [
      'name: demo-app',
      'version: 1.10',
      'dependencies:',
      '  - name: ollama',
      '    version: 0.40',
      'assets:',
      '  desktop: demo.desktop',
      '  icon: demo.png',
      'tools:',
      '  timeoutMs: 30000',
      ''
    ].join('\n'));

    const recipe = await parseRecipeYml(path);
    assert.equal(recipe.version, '1.10');
    assert.deepEqual(recipe.dependencies, [{ name: 'ollama', versionConstraint: '0.40', preferredChannel: 'index' }]);
    assert.equal(recipe.tools.timeoutMs, 30000);
  });

  it('wraps validation failures with the recipe path', async () => {
    const path = join(dir, 'broken.yml');
    await writeFile(path, 'name: demo-app\n');

    await assert.rejects(parseRecipeYml(path), (error: unknown) =>
      error instanceof ConfigError &&
      error.message === `Invalid recipe ${path}: Validation error: version is required` &&
      error.stage === 'recipe'
    );
  });
});
