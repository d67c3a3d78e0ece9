import { describe, expect, it } from 'vitest';
import { CaseAnalyzer, NO_MATCH_SUMMARY } from '../src/analyzer/case-analyzer.js';
import { resolveCodeFamily, runCli, USAGE } from '../src/cli.js';

const analyzer = new CaseAnalyzer();

async function run(argv: string[]) {
  const out: string[] = [];
  const err: string[] = [];
  const code = await runCli(
    argv,
    {
      out: (line) => out.push(line),
      err: (line) => err.push(line),
    },
    () => analyzer
  );
  return { code, out, err };
}

describe('CLI', () => {
  it('prints the version', async () => {
    expect(await run(['--version'])).toEqual({ code: 0, out: ['1.0.0'], err: [] });
  });

  it('prints usage without a command', async () => {
    expect(await run([])).toEqual({ code: 0, out: [USAGE], err: [] });
  });

  it('looks up a section with a lower-case code', async () => {
    const { code, out } = await run(['lookup', 'ipc', '302']);

    expect(code).toBe(0);
    expect(out[0]?.split('\n')[0]).toBe('# IPC 302: Murder');
  });

  it('exits 1 when a section is missing', async () => {
    expect(await run(['lookup', 'IPC', '9999'])).toEqual({
      code: 1,
      out: [],
      err: ['IPC 9999 not found in database.'],
    });
  });

  it('maps an IPC section', async () => {
    const { code, out } = await run(['map', '498A']);

    expect(code).toBe(0);
    expect(out[0]?.split('\n')[0]).toBe('# IPC 498A -> BNS 85');
  });

  it('lists a code', async () => {
    const { code, out } = await run(['list', 'IPC']);

    expect(code).toBe(0);
    expect(out[0]?.split('\n')).toContain('- **IPC 34**: Acts done by several persons in furtherance of common intention');
  });

  it('analyzes text as JSON', async () => {
    const { code, out } = await run(['analyze', '--json', 'The accused was caught stealing a mobile phone.']);
    const json: { relevant_sections: { section_number: string }[] } = JSON.parse(out[0] ?? '{}');

    expect(code).toBe(0);
    expect(json.relevant_sections.map((s) => s.section_number)).toEqual(['379', '303']);
  });

  it('joins the remaining words into one description', async () => {
    const { out } = await run(['analyze', '--json', 'caught', 'stealing']);
    const json: { case_description: string } = JSON.parse(out[0] ?? '{}');

    expect(json.case_description).toBe('caught stealing');
  });

  it('analyzes an empty description like the other front ends', async () => {
    const { code, out } = await run(['analyze', '--json', '']);
    const json: { relevant_sections: unknown[]; summary: string } = JSON.parse(out[0] ?? '{}');

    expect(code).toBe(0);
    expect(json.relevant_sections).toEqual([]);
    expect(json.summary).toBe(NO_MATCH_SUMMARY);
  });

  it('needs a description argument for analyze', async () => {
    const { code, err } = await run(['analyze']);

    expect(code).toBe(2);
    expect(err[0]).toBe('Error: analyze needs a case description');
  });

  it('rejects a port with trailing characters', async () => {
    const { code, err } = await run(['serve', '--port', '8000abc']);

    expect(code).toBe(2);
    expect(err[0]).toBe('Error: invalid port "8000abc"');
  });

  it('rejects an unknown command', async () => {
    const { code, err } = await run(['frobnicate']);

    expect(code).toBe(2);
    expect(err[0]).toBe('Error: unknown command "frobnicate"');
  });

  it('rejects an unknown option', async () => {
    const { code } = await run(['lookup', '--bogus']);

    expect(code).toBe(2);
  });

  it('rejects an unknown code', async () => {
    const { code, err } = await run(['lookup', 'XYZ', '1']);

    expect(code).toBe(2);
    expect(err[0]).toBe('Error: unknown code "XYZ"');
  });

  it('resolves code families case-insensitively', () => {
    expect(resolveCodeFamily('it act')).toBe('IT Act');
    expect(resolveCodeFamily(' crpc ')).toBe('CrPC');
    expect(resolveCodeFamily('penal')).toBeNull();
  });
});
