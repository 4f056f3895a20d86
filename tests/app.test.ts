/**
 * Table-driven tests for filtering, grouping, settings and reports
 */

import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FilterParser, filterGoroutines } from '../src/app/filter.js';
import { fingerprint, groupGoroutines, type StackGroup } from '../src/app/grouping.js';
import { PLAIN_PALETTE, renderGoroutine, renderGroup, renderJSON, renderText, type RenderOptions } from '../src/app/report.js';
import { DEFAULT_SETTINGS, SETTINGS_FILE_NAME, SettingsError, SettingsManager } from '../src/app/SettingsManager.js';
import { BlockParseError } from '../src/parser/index.js';
import { TEST_DATA, assertEqual, parseOrThrow, test } from './shared-test-data.js';

const goroutines = parseOrThrow(TEST_DATA.serverDump, 'server-dump.txt');
const byId = (id: bigint) => {
  const goroutine = goroutines.find(g => g.id === id);
  if (!goroutine) throw new Error(`no goroutine ${id}`);
  return goroutine;
};

const plain: RenderOptions = { palette: PLAIN_PALETTE, functionTrimPrefixes: [], fileTrimPrefixes: [] };

await test('Filter queries', async () => {
  const filterParser = new FilterParser();
  const cases: Array<[string, bigint[]]> = [
    ['', [1n, 18n, 19n, 7n, 9n]],
    ['state:io', [18n, 19n]],
    ['state:CHAN', [7n]],
    ['-state:wait', [1n, 7n, 9n]],
    ['wait:>5', [18n, 19n]],
    ['wait:>=3', [18n, 19n, 7n]],
    ['wait:3', [7n]],
    ['wait:<3', [1n, 9n]],
    ['locked:true', [7n]],
    ['-locked:true', [1n, 18n, 19n, 9n]],
    ['creator:1', [18n, 19n, 9n]],
    ['id:<10', [1n, 7n, 9n]],
    ['id:19', [19n]],
    ['worker.go', [7n]],
    ['file:///app/internal', [7n, 9n]], // unknown field, searched as text
    ['conn -state:running', [18n, 19n]],
    ['state:IO  wait:>5 creator:1', [18n, 19n]],
    ['-Scheduler -conn', [1n, 7n]],
  ];

  for (const [query, expected] of cases) {
    const parsed = filterParser.parse(query);
    if (!parsed.valid) throw new Error(`"${query}": ${parsed.error}`);
    assertEqual(filterGoroutines(goroutines, parsed).map(g => g.id), expected, query);
  }
});

await test('Invalid filter queries', async () => {
  const filterParser = new FilterParser();
  const cases: Array<[string, string]> = [
    ['wait:abc', 'Invalid number for wait: abc'],
    ['id:>x', 'Invalid number for id: >x'],
    ['locked:maybe', 'Invalid value for locked: maybe'],
    ['state:', 'Invalid field term: state:'],
    ['-', 'Empty search term: -'],
  ];

  for (const [query, expected] of cases) {
    const parsed = filterParser.parse(query);
    assertEqual([parsed.valid, parsed.error], [false, expected], query);
    // An invalid query filters nothing out
    assertEqual(filterParser.matchesGoroutine(byId(1n), parsed), true, `${query} matches`);
  }
});

await test('Search text combined with a filter', async () => {
  const query = new FilterParser().parse('locked:false');
  assertEqual(filterGoroutines(goroutines, query, 'WORKER').map(g => g.id), [], 'locked worker excluded');
  assertEqual(filterGoroutines(goroutines, query, 'main.main').map(g => g.id), [1n, 9n], 'creator frame searched');
  assertEqual(filterGoroutines(goroutines, new FilterParser().parse(''), 'worker').map(g => g.id), [7n], 'search only');
});

await test('Grouping identical stacks', async () => {
  const groups = groupGoroutines(goroutines, new SettingsManager().getTitleRules());

  assertEqual(
    groups.map(g => [g.goroutineIds, g.state, g.title, g.count, g.maxWaitMinutes]),
    [
      [[18n, 19n], 'IO wait', 'net/http.(*conn).serve', 2, 12],
      [[1n], 'running', 'main.main', 1, 0],
      [[7n], 'chan receive', 'main.(*Worker).loop', 1, 3],
      [[9n], 'select', 'main.(*Scheduler).run', 1, 0],
    ],
    'groups'
  );
  assertEqual(groups[0].trace, byId(18n).trace, 'group trace');
  if (!/^[0-9a-f]{24}$/.test(groups[0].traceId)) throw new Error(`bad traceId ${groups[0].traceId}`);
  assertEqual(groupGoroutines([]), [], 'no goroutines');
});

await test('Grouping keys on state and location, not arguments', async () => {
  const [a, b, c, d] = parseOrThrow(`goroutine 1 [select]:
main.loop(0x1)
	/loop.go:5 +0x10

goroutine 2 [select]:
main.loop(0x2)
	/loop.go:5 +0x22

goroutine 3 [chan send]:
main.loop(0x3)
	/loop.go:5 +0x10

goroutine 4 [select]:
main.loop(0x4)
	/loop.go:6 +0x10
`);

  assertEqual(fingerprint(a.trace), fingerprint(b.trace), 'arguments and offsets ignored');
  assertEqual(fingerprint(a.trace) === fingerprint(d.trace), false, 'line numbers count');
  assertEqual(
    groupGoroutines([a, b, c, d]).map(g => g.goroutineIds),
    [[1n, 2n], [3n], [4n]],
    'groups'
  );
  assertEqual(groupGoroutines([a, b, c, d])[1].traceId, fingerprint(a.trace), 'same trace, other state');
});

await test('Settings resolution', async () => {
  assertEqual(new SettingsManager().getSettings(), DEFAULT_SETTINGS, 'defaults');

  const settings = SettingsManager.fromJSON(
    JSON.stringify({
      nameSkipRules: { ignoreDefault: true, custom: ['main.'] },
      fileTrimPrefixes: { custom: ['/usr/local/go/src/', '(unclosed'] },
      zipFilePatterns: { custom: ['\\.dump$'] },
    })
  );
  const resolved = settings.getSettings();
  assertEqual(resolved.nameSkipRules, ['main.'], 'ignoreDefault');
  assertEqual(resolved.nameTrimRules, DEFAULT_SETTINGS.nameTrimRules, 'untouched setting');
  assertEqual(resolved.zipFilePatterns, ['^(.*/)?stacks\\.txt$', '\\.dump$'], 'custom appended');

  const [goSrc, literal] = settings.getFileTrimPrefixes();
  assertEqual(goSrc.test('/usr/local/go/src/net/http/server.go'), true, 'prefix match');
  assertEqual(goSrc.test('/opt/usr/local/go/src/x.go'), false, 'anchored');
  assertEqual(literal.test('(unclosed/x.go'), true, 'invalid regex matched literally');

  assertEqual(
    settings.getZipFilePatterns().map(pattern => pattern.test('debug/node1.dump')),
    [false, true],
    'zip patterns'
  );
  assertEqual(settings.getTitleRules().slice(0, 2), [{ skip: 'main.' }, { trim: DEFAULT_SETTINGS.nameTrimRules[0] }], 'title rules');
});

await test('Invalid settings', async () => {
  const cases: Array<[string, string]> = [
    ['not json', 'settings is not valid JSON: '],
    ['[]', 'settings must contain a JSON object'],
    ['{"colour":{}}', "settings: unknown setting 'colour'"],
    ['{"nameSkipRules":true}', "settings: 'nameSkipRules' must be an object with ignoreDefault and/or custom"],
    ['{"nameSkipRules":{"ignoreDefault":"yes"}}', "settings: 'nameSkipRules.ignoreDefault' must be boolean, got string"],
    ['{"nameTrimRules":{"custom":"a\\nb"}}', `settings: 'nameTrimRules.custom' must be string[] Convert "rule1\\nrule2" to ["rule1", "rule2"]`],
  ];

  for (const [json, expected] of cases) {
    try {
      SettingsManager.fromJSON(json);
    } catch (error) {
      if (!(error instanceof SettingsError)) throw new Error(`${json}: expected SettingsError`);
      if (!error.message.startsWith(expected)) {
        throw new Error(`${json}: expected message starting "${expected}", got "${error.message}"`);
      }
      continue;
    }
    throw new Error(`${json}: expected an error`);
  }
});

await test('Settings file loading', async () => {
  const dir = mkdtempSync(join(tmpdir(), 'settings-'));

  assertEqual(SettingsManager.load(undefined, dir).getStoredSettings(), {}, 'no file');

  writeFileSync(join(dir, SETTINGS_FILE_NAME), JSON.stringify({ functionTrimPrefixes: { custom: ['main.'] } }));
  assertEqual(SettingsManager.load(undefined, dir).getSettings().functionTrimPrefixes, ['main.'], 'default file');

  const explicit = join(dir, 'custom.json');
  writeFileSync(explicit, '{"nameTrimRules":{"ignoreDefault":true}}');
  assertEqual(SettingsManager.load(explicit, dir).getSettings().nameTrimRules, [], 'explicit file');

  const missing = join(dir, 'missing.json');
  try {
    SettingsManager.load(missing, dir);
    throw new Error('expected an error for a missing settings file');
  } catch (error) {
    if (!(error instanceof SettingsError)) throw error;
    if (!error.message.startsWith(`Failed to read settings from ${missing}: `)) {
      throw new Error(`unexpected message: ${error.message}`);
    }
  }
});

await test('Rendering goroutines', async () => {
  assertEqual(
    renderGoroutine(byId(7n), plain),
    [
      'goroutine 7 [chan receive, 3 minutes, locked to thread]:',
      'main.(*Worker).loop(0xc000012345)',
      '   file:///app/internal/worker/worker.go#88 +0x5a',
      'created by main.startWorkers',
      '   file:///app/cmd/server/main.go#30 +0x7f',
    ].join('\n'),
    'goroutine 7'
  );

  const trimmed: RenderOptions = { ...plain, fileTrimPrefixes: [/^\/app\//], functionTrimPrefixes: [/^main\./] };
  assertEqual(
    renderGoroutine(byId(9n), trimmed),
    [
      'goroutine 9 [select]:',
      '(*Scheduler).run.func1()',
      '   file://internal/sched/sched.go#61',
      'created by main in goroutine 1',
      '   file://cmd/server/main.go#35 +0xc5',
    ].join('\n'),
    'goroutine 9 with trim prefixes'
  );

  const [elided] = parseOrThrow('goroutine 2 [running]:\nmain.a()\n\t/a.go:1\n...additional frames elided...\n');
  assertEqual(
    renderGoroutine(elided, plain),
    'goroutine 2 [running]:\nmain.a()\n   file:///a.go#1\n...additional frames elided...',
    'elided'
  );
});

await test('Standard library frames are muted', async () => {
  const marked: RenderOptions = { ...plain, palette: { ...PLAIN_PALETTE, muted: str => `~${str}~` } };

  assertEqual(
    renderGoroutine(byId(18n), marked).split('\n'),
    [
      'goroutine 18 [IO wait, 12 minutes]:',
      '~runtime.gopark(0x0?, 0x0?, 0x0?, 0x0?, 0x0?)~',
      '   file:///usr/local/go/src/runtime/proc.go#402 +0xce',
      '~internal/poll.runtime_pollWait(0x7f2c1c0e8e80, 0x72)~',
      '   file:///usr/local/go/src/runtime/netpoll.go#345 +0x85',
      '~net/http.(*conn).serve(0xc0001a6000, {0x9a1d28, 0xc00019e0f0})~',
      '   file:///usr/local/go/src/net/http/server.go#2039 +0x81c',
      '~created by net/http.(*Server).Serve~~ in goroutine 1~',
      '   file:///usr/local/go/src/net/http/server.go#3285 +0x4b4',
    ],
    'stdlib goroutine'
  );
  assertEqual(
    renderGoroutine(byId(7n), marked).split('\n')[1],
    'main.(*Worker).loop(0xc000012345)',
    'application frame'
  );
});

await test('Filtering on ids beyond the double-precision range', async () => {
  const large = parseOrThrow(`goroutine 9007199254740993 [running]:

goroutine 9007199254740992 [running]:
main.a()
	/a.go:1
created by main.b in goroutine 9007199254740993
	/b.go:2
`);
  const filterParser = new FilterParser();
  const ids = (query: string) => filterGoroutines(large, filterParser.parse(query)).map(g => g.id);

  assertEqual(ids('id:>9007199254740992'), [9007199254740993n], 'greater than');
  assertEqual(ids('id:9007199254740992'), [9007199254740992n], 'equals');
  assertEqual(ids('creator:9007199254740993'), [9007199254740992n], 'creator');
  assertEqual(ids('740993'), [9007199254740993n], 'text search over ids');
});

await test('Rendering groups', async () => {
  const [serve] = groupGoroutines(goroutines, new SettingsManager().getTitleRules());
  const lines = renderGroup(serve, plain).split('\n');
  assertEqual(lines.slice(0, 4), [
    '2 goroutines [IO wait, up to 12 minutes] net/http.(*conn).serve',
    'ids: 18, 19',
    'runtime.gopark(0x0?, 0x0?, 0x0?, 0x0?, 0x0?)',
    '   file:///usr/local/go/src/runtime/proc.go#402 +0xce',
  ], 'header and first frame');
  assertEqual(lines.length, 8, 'line count');

  const big: StackGroup = {
    traceId: 'f'.repeat(24),
    state: 'select',
    title: 'main.loop',
    count: 12,
    goroutineIds: [1n, 2n, 3n, 4n, 5n, 6n, 7n, 8n, 9n, 10n, 11n, 12n],
    maxWaitMinutes: 0,
    trace: [],
  };
  assertEqual(
    renderGroup(big, plain),
    '12 goroutines [select] main.loop\nids: 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, ... (2 more)',
    'long id list'
  );
});

await test('Text and JSON reports', async () => {
  const diagnostic = new BlockParseError('Could not parse goroutine id "x"', 1, 'goroutine x [running]:');
  const one = { name: 'a.txt', goroutines: [byId(1n)], totalGoroutines: 5, groups: null, diagnostics: [] };

  assertEqual(
    renderText([one], plain),
    'goroutine 1 [running]:\nmain.main()\n   file:///app/cmd/server/main.go#42 +0x1d\n\na.txt: 1 of 5 goroutines\n',
    'text'
  );

  const grouped = { ...one, name: 'b.txt', groups: groupGoroutines([byId(1n)]), diagnostics: [diagnostic] };
  const text = renderText([one, grouped], plain);
  assertEqual(
    text.split('\n').slice(-3),
    ['a.txt: 1 of 5 goroutines', 'b.txt: 1 of 5 goroutines, 1 stacks, 1 skipped', ''],
    'summaries'
  );

  // Ids are written as strings
  const mainFrame = { func: 'main.main()', file: '/app/cmd/server/main.go', line: 42, position: 0x1d };
  const json: unknown = JSON.parse(renderJSON([one, grouped]));
  assertEqual(
    json,
    {
      inputs: [
        {
          name: 'a.txt',
          totalGoroutines: 5,
          goroutines: [
            {
              id: '1',
              state: 'running',
              waitMinutes: 0,
              lockedToThread: false,
              labels: [],
              trace: [mainFrame],
              createdBy: null,
              creatorId: null,
              framesElided: false,
            },
          ],
          diagnostics: [],
        },
        {
          name: 'b.txt',
          totalGoroutines: 5,
          groups: [
            {
              traceId: grouped.groups[0].traceId,
              state: 'running',
              title: 'main.main',
              count: 1,
              goroutineIds: ['1'],
              maxWaitMinutes: 0,
              trace: [mainFrame],
            },
          ],
          diagnostics: [{ kind: 'BlockParseError', line: 1, message: 'line 1: Could not parse goroutine id "x"' }],
        },
      ],
    },
    'json'
  );
});
