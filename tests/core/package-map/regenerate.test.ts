/**
 * Package Map Regeneration Tests
 *
 * Full rebuilds of vendor/volcano-packages.php from installed and local
 * packages, against a throwaway project directory.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';

import { regeneratePackageMap } from '../../../src/core/package-map/regenerate.js';
import { renderPackageMap } from '../../../src/core/package-map/package-map-file.js';
import { FileSystemError, ResolutionError } from '../../../src/utils/errors.js';
import type { PackageDescriptor } from '../../../src/types/index.js';
import { createTempProject, pluginPackage, removeTempProject, writeJson, writeText } from '../../test-helpers.js';

let root: string;
let vendorDir: string;
let packagesDir: string;
let outputFile: string;

function entryLine(namespace: string, relativePath: string): string {
  return `        '${namespace}' => $baseDir . '${relativePath}',`;
}

function expectedMap(lines: string[]): string {
  return [
    '<?php',
    '',
    '$baseDir = dirname(dirname(__FILE__));',
    '',
    'return array(',
    "    'packages' => array(",
    ...lines,
    '    ),',
    ');',
    ''
  ].join('\n');
}

async function regenerate(packages: PackageDescriptor[]) {
  return regeneratePackageMap({ packages, packagesDir, vendorDir });
}

beforeEach(async () => {
  root = await createTempProject('regenerate');
  vendorDir = join(root, 'vendor');
  packagesDir = join(root, 'packages');
  outputFile = join(vendorDir, 'volcano-packages.php');
});

afterEach(async () => {
  await removeTempProject(root);
});

describe('regeneratePackageMap', () => {
  it('maps an installed plugin to its vendor path, creating the vendor directory', async () => {
    const result = await regenerate([pluginPackage('acme/plugin', { 'Acme\\Plugin\\': 'src/' })]);

    assert.equal(result.outputFile, outputFile);
    assert.deepEqual(result.entries, [{ namespace: 'Acme/Plugin', path: join(vendorDir, 'acme/plugin') }]);
    assert.equal(
      await fs.readFile(outputFile, 'utf8'),
      expectedMap([entryLine('Acme/Plugin', '/vendor/acme/plugin/')])
    );
  });

  it('ignores packages of other types', async () => {
    const library: PackageDescriptor = {
      name: 'acme/library',
      type: 'library',
      version: '2.0.0',
      autoload: { 'psr-4': { 'Acme\\Library\\': 'src/' } }
    };

    const result = await regenerate([library, pluginPackage('acme/plugin', { 'Acme\\Plugin\\': 'src/' })]);
    assert.deepEqual(result.entries.map(entry => entry.namespace), ['Acme/Plugin']);
  });

  it('adds plugins from the local packages directory and skips other directories', async () => {
    await writeJson(join(packagesDir, 'blog', 'composer.json'), {
      name: 'app/blog',
      type: 'volcano-package',
      autoload: { 'psr-4': { 'Blog\\': 'src/' } }
    });
    await writeJson(join(packagesDir, 'notes', 'composer.json'), {
      name: 'app/notes',
      type: 'library',
      autoload: { 'psr-4': { 'Notes\\': 'src/' } }
    });
    await writeText(join(packagesDir, 'broken', 'composer.json'), '{ "type": "volcano-package", ');
    await fs.mkdir(join(packagesDir, 'empty'), { recursive: true });

    const result = await regenerate([pluginPackage('acme/plugin', { 'Acme\\Plugin\\': 'src/' })]);

    assert.deepEqual(result.entries, [
      { namespace: 'Acme/Plugin', path: join(vendorDir, 'acme/plugin') },
      { namespace: 'Blog', path: join(packagesDir, 'blog') }
    ]);
    assert.equal(
      await fs.readFile(outputFile, 'utf8'),
      expectedMap([
        entryLine('Acme/Plugin', '/vendor/acme/plugin/'),
        entryLine('Blog', '/packages/blog/')
      ])
    );
  });

  it('lets a local package win a namespace collision', async () => {
    await writeJson(join(packagesDir, 'blog', 'composer.json'), {
      name: 'app/blog',
      type: 'volcano-package',
      autoload: { 'psr-4': { 'Blog\\': 'src/' } }
    });

    const result = await regenerate([pluginPackage('vendor/blog', { 'Blog\\': 'src/' })]);

    assert.deepEqual(result.entries, [{ namespace: 'Blog', path: join(packagesDir, 'blog') }]);
    assert.deepEqual(result.plugins.map(plugin => plugin.source), ['local']);
  });

  it('sorts entries by namespace regardless of input order', async () => {
    const result = await regenerate([
      pluginPackage('z/zeta', { 'Zeta\\': 'src/' }),
      pluginPackage('m/mid', { 'Mid\\': 'src/' }),
      pluginPackage('a/alpha', { 'Alpha\\': 'src/' })
    ]);

    assert.deepEqual(result.entries.map(entry => entry.namespace), ['Alpha', 'Mid', 'Zeta']);
    assert.equal(
      await fs.readFile(outputFile, 'utf8'),
      expectedMap([
        entryLine('Alpha', '/vendor/a/alpha/'),
        entryLine('Mid', '/vendor/m/mid/'),
        entryLine('Zeta', '/vendor/z/zeta/')
      ])
    );
  });

  it('produces byte-identical output when run twice', async () => {
    const packages = [
      pluginPackage('acme/shop', { 'Acme\\Shop\\': 'src/' }),
      pluginPackage('acme/blog', { 'Acme\\Blog\\': 'src/' })
    ];

    await regenerate(packages);
    const first = await fs.readFile(outputFile);
    await regenerate(packages);
    const second = await fs.readFile(outputFile);

    assert.ok(first.equals(second));
  });

  it('drops entries for packages that are gone', async () => {
    const blog = pluginPackage('acme/blog', { 'Acme\\Blog\\': 'src/' });
    const shop = pluginPackage('acme/shop', { 'Acme\\Shop\\': 'src/' });

    await regenerate([blog, shop]);
    await regenerate([shop]);

    assert.equal(
      await fs.readFile(outputFile, 'utf8'),
      expectedMap([entryLine('Acme/Shop', '/vendor/acme/shop/')])
    );
  });

  it('writes an empty mapping when no plugin remains', async () => {
    await regenerate([pluginPackage('acme/blog', { 'Acme\\Blog\\': 'src/' })]);
    const result = await regenerate([]);

    assert.deepEqual(result.entries, []);
    assert.equal(await fs.readFile(outputFile, 'utf8'), renderPackageMap([], root));
  });

  it('leaves no temporary file behind', async () => {
    await regenerate([pluginPackage('acme/blog', { 'Acme\\Blog\\': 'src/' })]);
    assert.deepEqual(await fs.readdir(vendorDir), ['volcano-packages.php']);
  });

  it('aborts on an unresolvable plugin and keeps the previous map', async () => {
    await regenerate([pluginPackage('acme/blog', { 'Acme\\Blog\\': 'src/' })]);
    const before = await fs.readFile(outputFile, 'utf8');

    await assert.rejects(
      regenerate([pluginPackage('acme/bad', { 'A\\': 'lib', 'B\\': 'app' })]),
      ResolutionError
    );
    assert.equal(await fs.readFile(outputFile, 'utf8'), before);
  });

  it('fails with a file system error when the output cannot replace its target', async () => {
    await regenerate([pluginPackage('acme/blog', { 'Acme\\Blog\\': 'src/' })]);
    const previous = await fs.readFile(outputFile, 'utf8');
    const blocked = join(vendorDir, 'blocked.php');
    await fs.mkdir(blocked);

    await assert.rejects(
      regeneratePackageMap({
        packages: [pluginPackage('acme/shop', { 'Acme\\Shop\\': 'src/' })],
        packagesDir,
        vendorDir,
        outputFile: blocked
      }),
      FileSystemError
    );

    assert.deepEqual((await fs.readdir(vendorDir)).sort(), ['blocked.php', 'volcano-packages.php']);
    assert.deepEqual(await fs.readdir(blocked), []);
    assert.equal(await fs.readFile(outputFile, 'utf8'), previous);
  });

  it('fails with a file system error when the vendor directory cannot be created', async () => {
    await writeText(vendorDir, 'not a directory');

    await assert.rejects(
      regenerate([pluginPackage('acme/blog', { 'Acme\\Blog\\': 'src/' })]),
      FileSystemError
    );

    assert.deepEqual(await fs.readdir(root), ['vendor']);
    assert.equal(await fs.readFile(vendorDir, 'utf8'), 'not a directory');
  });

  it('honours a custom package type and output file', async () => {
    const custom: PackageDescriptor = {
      name: 'acme/theme',
      type: 'acme-theme',
      version: '1.0.0',
      autoload: { 'psr-4': { 'Acme\\Theme\\': '' } }
    };
    const target = join(vendorDir, 'themes.php');

    const result = await regeneratePackageMap({
      packages: [custom, pluginPackage('acme/plugin', { 'Acme\\Plugin\\': 'src/' })],
      packagesDir,
      vendorDir,
      packageType: 'acme-theme',
      outputFile: target
    });

    assert.equal(result.outputFile, target);
    assert.equal(
      await fs.readFile(target, 'utf8'),
      expectedMap([entryLine('Acme/Theme', '/vendor/acme/theme/')])
    );
  });
});
