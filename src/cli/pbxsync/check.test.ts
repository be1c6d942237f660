import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import { setColorEnabled } from '../../lib/colors.js';
import { captureOutput, cliArgs } from '../../test-helpers/cli.js';
import type { CapturedOutput } from '../../test-helpers/cli.js';
import { createTempProject, manifestPathOf, removeTempProject, renderPbxproj } from '../../test-helpers/pbxproj.js';
import { checkCommand } from './check.js';

describe('check command', () => {
  let output: CapturedOutput;
  const roots: string[] = [];

  function project(files: string[]): string {
    const root = createTempProject(files);
    roots.push(root);
    return root;
  }

  beforeEach(() => {
    setColorEnabled(false);
    output = captureOutput();
  });

  afterEach(() => {
    for (const root of roots.splice(0)) {
      removeTempProject(root);
    }
    vi.restoreAllMocks();
  });

  it('passes when the project matches the filesystem', async () => {
    const root = project(['Managers/A.swift', 'Views/B.swift']);

    await checkCommand.handler(cliArgs({ root }));

    expect(output.lines()).toEqual(['[OK] Project is in sync with the filesystem']);
    expect(output.exit).not.toHaveBeenCalled();
  });

  it('lists drift and exits 1', async () => {
    const root = project(['Managers/A.swift', 'Views/C.swift']);

    await checkCommand.handler(cliArgs({ root }));

    expect(output.lines()).toEqual(['[WARN] Not in project: C.swift', '[WARN] Missing on disk: B.swift']);
    expect(output.exit).toHaveBeenCalledWith(1);
    expect(fs.readFileSync(manifestPathOf(root), 'utf8')).toBe(renderPbxproj());
  });

  it('reports drift as an OUT_OF_SYNC error in JSON', async () => {
    const root = project(['Managers/A.swift', 'Views/C.swift']);

    await checkCommand.handler(cliArgs({ root, json: true }));

    expect(JSON.parse(output.lines()[0] ?? '')).toMatchObject({
      success: false,
      command: 'check',
      error: {
        code: 'OUT_OF_SYNC',
        details: { missing: ['C.swift'], stale: ['B.swift'], duplicates: [], orphans: [] },
        suggestion: 'Run `pbxsync sync` to update the project.',
      },
    });
  });

  it('reports an in-sync project as success in JSON', async () => {
    const root = project(['Managers/A.swift', 'Views/B.swift']);

    await checkCommand.handler(cliArgs({ root, json: true }));

    expect(JSON.parse(output.lines()[0] ?? '')).toMatchObject({
      success: true,
      data: { manifestPath: manifestPathOf(root), inSync: true, missing: [] },
    });
  });
});
