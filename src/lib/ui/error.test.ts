import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { printError, errorToDisplay } from './error.js';
import { setJsonMode } from './output.js';
import { setColorEnabled } from '../colors.js';
import { MalformedManifestError, WriteFailureError } from '../errors.js';

describe('ui/error', () => {
  let errorSpy: MockInstance;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    setColorEnabled(false);
  });

  afterEach(() => {
    setJsonMode(false);
    vi.restoreAllMocks();
  });

  describe('printError', () => {
    it('writes title, detail and hint lines to stderr', () => {
      printError({ title: 'Write failed', detail: 'Backup: /p/x.backup', hint: 'check permissions' });

      expect(errorSpy.mock.calls.map((call) => call[0])).toEqual([
        '[ERROR] Write failed',
        '  Backup: /p/x.backup',
        '  Hint: check permissions',
      ]);
    });

    it('writes only the title when nothing else is given', () => {
      printError({ title: 'Something failed' });
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });

    it('is silent in JSON mode', () => {
      setJsonMode(true);
      printError({ title: 'Something failed' });
      expect(errorSpy).not.toHaveBeenCalled();
    });
  });

  describe('errorToDisplay', () => {
    it('names the manifest of a parse error', () => {
      const error = new MalformedManifestError('Unterminated entry', { manifestPath: '/p/project.pbxproj', line: 4 });

      expect(errorToDisplay(error)).toEqual({
        title: 'Unterminated entry (line 4)',
        detail: 'In /p/project.pbxproj',
        hint: 'Open the project in Xcode to repair it, or restore it from version control.',
      });
    });

    it('names the backup of a write failure', () => {
      const error = new WriteFailureError('Failed to write /p/project.pbxproj: EACCES', {
        manifestPath: '/p/project.pbxproj',
        backupPath: '/p/project.pbxproj.backup',
      });

      expect(errorToDisplay(error).detail).toBe('Backup: /p/project.pbxproj.backup');
    });

    it('handles non-Error values', () => {
      expect(errorToDisplay('boom')).toEqual({ title: 'boom', detail: undefined, hint: undefined });
    });
  });
});
