import { extractSubdomains, filterSubdomains, finalizeSubdomains } from '../lib/extract';
import type { Severity, StatusLogger } from '../lib/report/status';

describe('extractSubdomains', () => {
  test('splits multi-name records, lowercases and strips the wildcard', () => {
    const out = extractSubdomains([{ name_value: '*.Api.Example.com\nwww.example.com' }], 'example.com');
    expect(out).toEqual(new Set(['api.example.com', 'www.example.com']));
  });

  test('matching is a substring test', () => {
    const out = extractSubdomains(
      [{ name_value: 'notexample.com.evil.org\nother.org' }, { name_value: '*.example.com' }],
      'example.com',
    );
    expect(out).toEqual(new Set(['notexample.com.evil.org', 'example.com']));
  });

  test('strips exactly one wildcard label', () => {
    const out = extractSubdomains([{ name_value: '*.*.example.com' }], 'example.com');
    expect(out).toEqual(new Set(['*.example.com']));
  });

  test('dedupes after trimming and lowercasing', () => {
    const out = extractSubdomains(
      [{ name_value: 'API.example.com' }, { name_value: '  api.example.com \n' }],
      'EXAMPLE.COM',
    );
    expect(out).toEqual(new Set(['api.example.com']));
  });

  test('skips malformed records and keeps going', () => {
    const lines: Array<[Severity, string]> = [];
    const status: StatusLogger = { log: (severity, message) => { lines.push([severity, message]); } };

    const out = extractSubdomains(
      [null, { name_value: 42 }, { id: 7 }, 'str', { name_value: 'a.example.com' }],
      'example.com',
      status,
    );

    expect(out).toEqual(new Set(['a.example.com']));
    expect(lines.map(([severity, message]) => [severity, message.split(':')[0]])).toEqual([
      ['warning', 'Error parsing certificate record #0'],
      ['warning', 'Error parsing certificate record #1'],
      ['warning', 'Error parsing certificate record #3'],
    ]);
  });

  test('every result comes from some raw name', () => {
    const names = ['*.a.example.com', 'B.example.com', 'x.other.net', ' c.example.com'];
    const out = extractSubdomains([{ name_value: names.join('\n') }], 'example.com');
    const cleaned = names.map((n) => n.trim().toLowerCase().replace(/^\*\./, ''));
    for (const sub of out) expect(cleaned).toContain(sub);
    expect(out.size).toBe(3);
  });

  test('is deterministic', () => {
    const records = [{ name_value: 'b.example.com\na.example.com' }];
    expect(extractSubdomains(records, 'example.com')).toEqual(extractSubdomains(records, 'example.com'));
  });
});

describe('filterSubdomains', () => {
  const subs = new Set(['api.example.com', 'www.example.com', 'myapi.example.com']);

  test('keeps names containing the keyword, any case', () => {
    expect(filterSubdomains(subs, 'API')).toEqual(new Set(['api.example.com', 'myapi.example.com']));
  });

  test('is idempotent', () => {
    const once = filterSubdomains(subs, 'api');
    expect(filterSubdomains(once, 'api')).toEqual(once);
  });

  test('no keyword keeps everything in a new set', () => {
    const out = filterSubdomains(subs);
    expect(out).toEqual(subs);
    expect(out).not.toBe(subs);
    expect(filterSubdomains(subs, '')).toEqual(subs);
  });
});

describe('finalizeSubdomains', () => {
  const subs = new Set(['b.x.com', 'a.x.com', 'c.x.com']);

  test('sorts ascending', () => {
    expect(finalizeSubdomains(subs)).toEqual(['a.x.com', 'b.x.com', 'c.x.com']);
  });

  test('applies a positive limit after sorting', () => {
    expect(finalizeSubdomains(subs, 2)).toEqual(['a.x.com', 'b.x.com']);
    expect(finalizeSubdomains(subs, 0)).toEqual(['a.x.com', 'b.x.com', 'c.x.com']);
    expect(finalizeSubdomains(subs, 10)).toHaveLength(3);
  });
});
