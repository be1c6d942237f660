import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { _resetForTesting, logger } from '../../lib/logger.js';
import { print, setJsonMode } from '../../lib/ui/index.js';
import { captureOutput } from '../../test-helpers/cli.js';
import type { CapturedOutput } from '../../test-helpers/cli.js';
import { createTempProject, manifestPathOf, removeTempProject } from '../../test-helpers/pbxproj.js';
import { applyGlobalOptions, createProgram } from './program.js';

describe('pbxsync program', () => {
  let root: string;
  let output: CapturedOutput;

  beforeEach(() => {
    output = captureOutput();
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    root = createTempProject(['Managers/A.swift', 'Views/B.swift']);
  });

  afterEach(() => {
    removeTempProject(root);
    setJsonMode(false);
    _resetForTesting();
    vi.restoreAllMocks();
  });

  describe('applyGlobalOptions', () => {
    it('sets JSON mode and the log level', () => {
      applyGlobalOptions({ json: true, verbose: true });
      print('hidden in JSON mode');
      expect(output.log).not.toHaveBeenCalled();
      expect(logger.level).toBe(4);
    });

    it('quiet wins over verbose', () => {
      applyGlobalOptions({ quiet: true, verbose: true });
      expect(logger.level).toBe(0);
    });
  });

  describe('createProgram', () => {
    it('runs a command with global options after it', async () => {
      await createProgram(['check', '--root', root, '--json']).parseAsync();

      expect(output.exit).not.toHaveBeenCalled();
      expect(JSON.parse(output.lines()[0] ?? '')).toMatchObject({
        success: true,
        command: 'check',
        data: { manifestPath: manifestPathOf(root), inSync: true },
      });
    });

    it('accepts short aliases', async () => {
      await createProgram(['sync', '-n', '-j', '--root', root]).parseAsync();

      expect(JSON.parse(output.lines()[0] ?? '')).toMatchObject({
        command: 'sync',
        data: { dryRun: true, written: false },
      });
    });
  });
});
