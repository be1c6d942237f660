import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { printDim, printStatus, printStatusLines } from './status.js';
import { setJsonMode } from './output.js';
import { setColorEnabled } from '../colors.js';

describe('ui/status', () => {
  let logSpy: MockInstance;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    setColorEnabled(false);
  });

  afterEach(() => {
    setJsonMode(false);
    vi.restoreAllMocks();
  });

  function printed(): unknown[] {
    return logSpy.mock.calls.map((call) => call[0]);
  }

  describe('printStatus', () => {
    it('prefixes the message with the status icon', () => {
      printStatus('success', 'Added 1 file: C.swift');
      printStatus('warning', 'A.swift is already in the project');
      expect(printed()).toEqual(['[OK] Added 1 file: C.swift', '[WARN] A.swift is already in the project']);
    });

    it('is silent in JSON mode', () => {
      setJsonMode(true);
      printStatus('info', 'hidden');
      expect(logSpy).not.toHaveBeenCalled();
    });
  });

  describe('printStatusLines', () => {
    it('prints each line in order', () => {
      printStatusLines([
        { level: 'success', message: 'Removed 1 file: B.swift' },
        { level: 'info', message: 'Project is already up to date' },
      ]);
      expect(printed()).toEqual(['[OK] Removed 1 file: B.swift', '[INFO] Project is already up to date']);
    });
  });

  describe('printDim', () => {
    it('prints the message with optional indentation', () => {
      printDim('Dry run: manifest not written');
      printDim('nested', 2);
      expect(printed()).toEqual(['Dry run: manifest not written', '  nested']);
    });
  });
});
