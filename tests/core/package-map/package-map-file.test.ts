import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  getPackageMapPath,
  getPackageMapRoot,
  parsePackageMap,
  renderPackageMap,
  sortPackageMapEntries
} from '../../../src/core/package-map/package-map-file.js';
import { MalformedPackageMapError } from '../../../src/utils/errors.js';

const EMPTY_MAP = [
  '<?php',
  '',
  '$baseDir = dirname(dirname(__FILE__));',
  '',
  'return array(',
  "    'packages' => array(),",
  ');',
  ''
].join('\n');

function mapWith(entryLines: string[]): string {
  return [
    '<?php',
    '',
    '$baseDir = dirname(dirname(__FILE__));',
    '',
    'return array(',
    "    'packages' => array(",
    ...entryLines,
    '    ),',
    ');',
    ''
  ].join('\n');
}

describe('renderPackageMap', () => {
  it('renders an empty mapping', () => {
    assert.equal(renderPackageMap([], '/proj'), EMPTY_MAP);
  });

  it('sorts entries and writes paths under the root against $baseDir', () => {
    const contents = renderPackageMap(
      [
        { namespace: 'Zeta/Plugin', path: '/proj/packages/zeta' },
        { namespace: 'Acme/Plugin', path: '/proj/vendor/acme/plugin' },
        { namespace: 'Ext/Lib', path: '/opt/shared/ext/' }
      ],
      '/proj'
    );

    assert.equal(contents, mapWith([
      "        'Acme/Plugin' => $baseDir . '/vendor/acme/plugin/',",
      "        'Ext/Lib' => '/opt/shared/ext/',",
      "        'Zeta/Plugin' => $baseDir . '/packages/zeta/',"
    ]));
  });

  it('normalizes backslashes and repeated separators', () => {
    const contents = renderPackageMap(
      [{ namespace: 'Acme/Plugin', path: 'C:\\proj\\vendor\\\\acme\\plugin\\' }],
      'C:\\proj'
    );

    assert.equal(contents, mapWith(["        'Acme/Plugin' => $baseDir . '/vendor/acme/plugin/',"]));
  });

  it('does not treat a sibling directory sharing the root prefix as inside the root', () => {
    const contents = renderPackageMap([{ namespace: 'Other', path: '/project2/plugin' }], '/proj');
    assert.equal(contents, mapWith(["        'Other' => '/project2/plugin/',"]));
  });

  it('escapes quotes in keys and paths', () => {
    const contents = renderPackageMap([{ namespace: "O'Brien", path: "/srv/o'brien" }], '/proj');
    assert.equal(contents, mapWith(["        'O\\'Brien' => '/srv/o\\'brien/',"]));
  });
});

describe('sortPackageMapEntries', () => {
  it('orders by code unit, uppercase before lowercase', () => {
    const sorted = sortPackageMapEntries([
      { namespace: 'beta', path: '/b' },
      { namespace: 'Beta', path: '/B' },
      { namespace: 'Alpha/Sub', path: '/as' },
      { namespace: 'Alpha', path: '/a' }
    ]);
    assert.deepEqual(sorted.map(entry => entry.namespace), ['Alpha', 'Alpha/Sub', 'Beta', 'beta']);
  });
});

describe('parsePackageMap', () => {
  it('reads back what renderPackageMap wrote', () => {
    const contents = renderPackageMap(
      [
        { namespace: 'Zeta/Plugin', path: '/proj/packages/zeta' },
        { namespace: 'Acme/Plugin', path: '/proj/vendor/acme/plugin' },
        { namespace: 'Ext/Lib', path: '/opt/shared/ext' },
        { namespace: "O'Brien", path: '/srv/obrien' }
      ],
      '/proj'
    );

    assert.deepEqual(parsePackageMap(contents, '/proj'), [
      { namespace: 'Acme/Plugin', path: '/proj/vendor/acme/plugin' },
      { namespace: 'Ext/Lib', path: '/opt/shared/ext' },
      { namespace: "O'Brien", path: '/srv/obrien' },
      { namespace: 'Zeta/Plugin', path: '/proj/packages/zeta' }
    ]);
  });

  it('resolves $baseDir against the given root', () => {
    const contents = mapWith(["        'Acme/Plugin' => $baseDir . '/vendor/acme/plugin/',"]);
    assert.deepEqual(parsePackageMap(contents, '/moved/project'), [
      { namespace: 'Acme/Plugin', path: '/moved/project/vendor/acme/plugin' }
    ]);
  });

  it('accepts the compact $baseDir .\'...\' spelling and a missing trailing comma', () => {
    const contents = mapWith([
      "        'Acme/Blog' => $baseDir .'/vendor/acme/blog/',",
      "        'Acme/Shop' => '/opt/shop/'"
    ]);
    assert.deepEqual(parsePackageMap(contents, '/proj'), [
      { namespace: 'Acme/Blog', path: '/proj/vendor/acme/blog' },
      { namespace: 'Acme/Shop', path: '/opt/shop' }
    ]);
  });

  it('returns no entries for the empty mapping', () => {
    assert.deepEqual(parsePackageMap(EMPTY_MAP, '/proj'), []);
  });

  it('keeps the last value of a duplicated key', () => {
    const contents = mapWith([
      "        'Acme/Blog' => '/first/',",
      "        'Acme/Blog' => '/second/',"
    ]);
    assert.deepEqual(parsePackageMap(contents, '/proj'), [{ namespace: 'Acme/Blog', path: '/second' }]);
  });

  it('rejects contents that are not a package map', () => {
    const cases: Array<[string, string]> = [
      ['{"packages": {}}', 'missing <?php tag'],
      ['<?php\n', 'missing return array('],
      ['<?php\n\necho "hello";\n', 'unexpected content on line 3'],
      ['<?php\n\nreturn array(\n    \'plugins\' => array(),\n);\n', "missing 'packages' array"],
      [mapWith(["        'Acme/Blog' => 42,"]), 'unexpected content on line 7'],
      ["<?php\n\nreturn array(\n    'packages' => array(\n        'Acme/Blog' => '/x/',\n", "unterminated 'packages' array"],
      ["<?php\n\nreturn array(\n    'packages' => array(),\n", 'unterminated return array(']
    ];

    for (const [contents, reason] of cases) {
      assert.throws(
        () => parsePackageMap(contents, '/proj', 'vendor/volcano-packages.php'),
        (error: unknown) => {
          assert.ok(error instanceof MalformedPackageMapError);
          assert.deepEqual(error.details, { file: 'vendor/volcano-packages.php', reason });
          return true;
        }
      );
    }
  });
});

describe('parsePackageMap on hand-edited files', () => {
  function reasonOf(contents: string): string {
    try {
      parsePackageMap(contents, '/proj', 'map.php');
    } catch (error) {
      assert.ok(error instanceof MalformedPackageMapError);
      assert.equal(error.details?.file, 'map.php');
      return String(error.details?.reason);
    }
    assert.fail('expected the map to be rejected');
  }

  it('rejects statements before return array(', () => {
    const contents = [
      '<?php',
      '',
      '$baseDir = dirname(dirname(__FILE__));',
      '$custom = require __DIR__ . "/extra.php";',
      '',
      'return array(',
      "    'packages' => array(),",
      ');',
      ''
    ].join('\n');

    assert.equal(reasonOf(contents), 'unexpected content on line 4');
  });

  it('rejects keys beside the packages block', () => {
    const contents = [
      '<?php',
      '',
      '$baseDir = dirname(dirname(__FILE__));',
      '',
      'return array(',
      "    'packages' => array(),",
      "    'themes' => array('Dark' => '/x/'),",
      ');',
      ''
    ].join('\n');

    assert.equal(reasonOf(contents), 'unexpected content on line 7');
  });

  it('rejects anything after the closing );', () => {
    assert.equal(reasonOf(`${EMPTY_MAP}echo 1;\n`), 'unexpected content on line 8');
  });

  it('accepts a map without the $baseDir statement', () => {
    const contents = "<?php\nreturn array(\n    'packages' => array(\n        'Acme/Blog' => '/opt/blog/',\n    ),\n);\n";
    assert.deepEqual(parsePackageMap(contents, '/proj'), [{ namespace: 'Acme/Blog', path: '/opt/blog' }]);
  });
});

describe('package map location', () => {
  it('lives in the vendor directory and resolves $baseDir to the project root', () => {
    const file = getPackageMapPath('/proj/vendor');
    assert.equal(file, '/proj/vendor/volcano-packages.php');
    assert.equal(getPackageMapRoot(file), '/proj');
  });
});
