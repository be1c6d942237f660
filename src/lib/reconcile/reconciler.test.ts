import { describe, it, expect } from 'vitest';
import { MalformedManifestError } from '../errors.js';
import {
  IdentifierGenerator,
  parseManifest,
  sequentialIdentifierSource,
} from '../manifest/index.js';
import type { ProjectManifest } from '../manifest/index.js';
import type { ScannedFile } from '../scanner/index.js';
import { Reconciler } from './reconciler.js';
import { isInSync, isReportEmpty } from './types.js';
import type { ReconcilerOptions } from './types.js';
import {
  IDS,
  buildFileLine,
  fileRefLine,
  listLine,
  renderPbxproj,
  standardParts,
} from '../../test-helpers/pbxproj.js';

const OPTIONS: ReconcilerOptions = {
  extensions: ['.swift'],
  fileType: 'sourcecode.swift',
  exclude: ['GrassIconPreview.swift'],
  groups: [
    { prefix: 'Managers/', group: 'Managers' },
    { prefix: 'Views/', group: 'Views' },
    { prefix: 'Models/', group: 'Models' },
  ],
  buildPhase: 'Sources',
};

const NEW_1 = 'AA0000000000000000000001';
const NEW_2 = 'AA0000000000000000000002';

const REF_D1 = 'A10000000000000000000003';
const REF_D2 = 'A10000000000000000000004';
const BUILD_D1 = 'B10000000000000000000003';
const BUILD_D2 = 'B10000000000000000000004';

function setup(text: string = renderPbxproj(), overrides: Partial<ReconcilerOptions> = {}) {
  const manifest = parseManifest(text);
  const reconciler = new Reconciler(manifest, {
    ...OPTIONS,
    ...overrides,
    ids: IdentifierGenerator.forManifest(manifest, sequentialIdentifierSource()),
  });
  return { manifest, reconciler };
}

function scanOf(...paths: string[]): ScannedFile[] {
  return paths.map((p) => ({ name: p.split('/').pop() ?? p, path: p }));
}

function names(manifest: ProjectManifest): string[] {
  return manifest.fileReferences().map((r) => r.name);
}

function childIds(manifest: ProjectManifest, group: string): string[] {
  return manifest.findGroupByName(group)?.list.items.map((i) => i.id) ?? [];
}

function sourceIds(manifest: ProjectManifest): string[] {
  return manifest.findBuildPhaseByName('Sources')?.list.items.map((i) => i.id) ?? [];
}

/**
 * Referential integrity and the dedup invariants
 */
function expectConsistent(manifest: ProjectManifest): void {
  const refIds = new Set(manifest.fileReferences().map((r) => r.id));
  for (const buildFile of manifest.buildFiles()) {
    if (buildFile.fileRef !== undefined) {
      expect(refIds.has(buildFile.fileRef)).toBe(true);
    }
  }

  const allNames = names(manifest);
  expect(new Set(allNames).size).toBe(allNames.length);

  const grouped = manifest.groups().flatMap((g) => g.list.items.map((i) => i.id));
  expect(new Set(grouped).size).toBe(grouped.length);

  const scheduled = manifest.buildPhases().flatMap((p) => p.list.items.map((i) => i.id));
  expect(new Set(scheduled).size).toBe(scheduled.length);
}

/**
 * Standard project plus a second D.swift entry pair
 */
function duplicateParts() {
  const parts = standardParts();
  parts.fileRefs.push(fileRefLine(REF_D1, 'D.swift'), fileRefLine(REF_D2, 'D.swift'));
  parts.buildFiles.push(buildFileLine(BUILD_D1, REF_D1, 'D.swift'), buildFileLine(BUILD_D2, REF_D2, 'D.swift'));
  parts.children.views.push(listLine(REF_D1, 'D.swift'), listLine(REF_D2, 'D.swift'));
  parts.sourcesFiles.push(listLine(BUILD_D1, 'D.swift in Sources'), listLine(BUILD_D2, 'D.swift in Sources'));
  return parts;
}

describe('Reconciler', () => {
  describe('add', () => {
    it('creates a linked file reference and build file in the matching group', () => {
      const { manifest, reconciler } = setup();

      const report = reconciler.add(['Views/C.swift']);

      expect(report).toEqual({
        added: ['C.swift'],
        removed: [],
        deduplicated: [],
        orphansRemoved: [],
        listEntriesRemoved: 0,
        issues: [],
      });
      expect(names(manifest)).toEqual(['Demo.app', 'A.swift', 'B.swift', 'C.swift']);
      expect(childIds(manifest, 'Views')).toEqual([IDS.refB, NEW_1]);
      expect(sourceIds(manifest)).toEqual([IDS.buildA, IDS.buildB, NEW_2]);

      const buildFile = manifest.buildFiles().find((b) => b.id === NEW_2);
      expect(buildFile?.fileRef).toBe(NEW_1);
      expectConsistent(manifest);
    });

    it('writes the path relative to the group folder', () => {
      const { manifest, reconciler } = setup();
      reconciler.add(['Views/Sub/C.swift']);
      const ref = manifest.fileReferences().find((r) => r.id === NEW_1);
      expect(ref?.path).toBe('Sub/C.swift');
    });

    it('reports names that are already tracked and leaves the manifest alone', () => {
      const text = renderPbxproj();
      const { manifest, reconciler } = setup(text);

      const report = reconciler.add(['Managers/A.swift']);

      expect(report.added).toEqual([]);
      expect(report.issues).toEqual([{ kind: 'already_present', name: 'A.swift' }]);
      expect(manifest.serialize()).toBe(text);
    });

    it('adds a name only once per batch', () => {
      const { manifest, reconciler } = setup();
      const report = reconciler.add(['Views/E.swift', 'Models/E.swift']);
      expect(report.added).toEqual(['E.swift']);
      expect(report.issues).toEqual([{ kind: 'already_present', name: 'E.swift' }]);
      expect(childIds(manifest, 'Models')).toEqual([]);
    });

    it('sends paths outside every category to the main group', () => {
      const { manifest, reconciler } = setup();
      reconciler.add(['Helpers/H.swift']);
      const main = manifest.groups().find((g) => g.id === IDS.mainGroup);
      expect(main?.list.items.map((i) => i.id).at(-1)).toBe(NEW_1);
      expect(manifest.fileReferences().find((r) => r.id === NEW_1)?.path).toBe('Helpers/H.swift');
    });

    it('falls back to the default group when a category group is missing', () => {
      const { manifest, reconciler } = setup(renderPbxproj(), {
        groups: [{ prefix: 'Services/', group: 'Services' }],
        defaultGroup: 'Models',
      });
      reconciler.add(['Services/S.swift']);
      expect(childIds(manifest, 'Models')).toEqual([NEW_1]);
    });

    it('marks files of other kinds as text', () => {
      const { manifest, reconciler } = setup();
      reconciler.add(['Views/notes.txt']);
      expect(manifest.fileReferences().find((r) => r.id === NEW_1)?.fileType).toBe('text');
    });

    it('fails when the configured build phase does not exist', () => {
      const { reconciler } = setup(renderPbxproj(), { buildPhase: 'Compile' });
      expect(() => reconciler.add(['Views/C.swift'])).toThrow(MalformedManifestError);
    });

    it('fails when the configured default group does not exist', () => {
      const { reconciler } = setup(renderPbxproj(), { defaultGroup: 'Nowhere' });
      expect(() => reconciler.add(['C.swift'])).toThrow('Default group "Nowhere" not found');
    });
  });

  describe('line endings', () => {
    it('keeps CRLF line endings after an edit', () => {
      const { manifest, reconciler } = setup(renderPbxproj().replace(/\n/g, '\r\n'));

      reconciler.add(['Views/C.swift']);

      const output = manifest.serialize();
      expect(output).toContain(`\t\t\t\t${NEW_1} /* C.swift */,\r\n`);
      expect(/[^\r]\n/.test(output)).toBe(false);
    });
  });

  describe('remove', () => {
    it('deletes the file reference, its build files and list entries', () => {
      const { manifest, reconciler } = setup();

      const report = reconciler.remove(['A.swift']);

      expect(report.removed).toEqual(['A.swift']);
      expect(names(manifest)).toEqual(['Demo.app', 'B.swift']);
      expect(manifest.buildFiles().map((b) => b.id)).toEqual([IDS.buildB]);
      expect(childIds(manifest, 'Managers')).toEqual([]);
      expect(sourceIds(manifest)).toEqual([IDS.buildB]);
      expectConsistent(manifest);
    });

    it('accepts a path and uses its file name', () => {
      const { manifest, reconciler } = setup();
      reconciler.remove(['Views/B.swift']);
      expect(names(manifest)).toEqual(['Demo.app', 'A.swift']);
    });

    it('reports unknown names without stopping the batch', () => {
      const { manifest, reconciler } = setup();
      const report = reconciler.remove(['Nope.swift', 'B.swift']);
      expect(report.issues).toEqual([{ kind: 'not_found', name: 'Nope.swift' }]);
      expect(report.removed).toEqual(['B.swift']);
      expect(names(manifest)).toEqual(['Demo.app', 'A.swift']);
    });
  });

  describe('sync', () => {
    it('removes every trace of files no longer on disk', () => {
      const { manifest, reconciler } = setup();

      const report = reconciler.sync(scanOf('Managers/A.swift'));

      expect(report.removed).toEqual(['B.swift']);
      expect(report.added).toEqual([]);
      expect(names(manifest)).toEqual(['Demo.app', 'A.swift']);
      expect(manifest.buildFiles().map((b) => b.fileRef)).toEqual([IDS.refA]);
      expect(childIds(manifest, 'Views')).toEqual([]);
      expect(sourceIds(manifest)).toEqual([IDS.buildA]);
      expect(manifest.serialize()).not.toContain('B.swift');
    });

    it('adds new files to their category group', () => {
      const { manifest, reconciler } = setup();
      const report = reconciler.sync(scanOf('Views/B.swift', 'Managers/A.swift', 'Models/M.swift'));
      expect(report.added).toEqual(['M.swift']);
      expect(childIds(manifest, 'Models')).toEqual([NEW_1]);
      expectConsistent(manifest);
    });

    it('is idempotent', () => {
      const { manifest, reconciler } = setup();
      const scan = scanOf('Managers/A.swift', 'Models/M.swift', 'Views/N.swift');

      reconciler.sync(scan);
      const first = manifest.serialize();
      const second = reconciler.sync(scan);

      expect(isReportEmpty(second)).toBe(true);
      expect(manifest.serialize()).toBe(first);
      expect(parseManifest(first).serialize()).toBe(first);
    });

    it('leaves excluded names in place', () => {
      const parts = standardParts();
      parts.fileRefs.push(fileRefLine('A10000000000000000000005', 'GrassIconPreview.swift'));
      parts.children.views.push(listLine('A10000000000000000000005', 'GrassIconPreview.swift'));
      const { manifest, reconciler } = setup(renderPbxproj(parts));

      const report = reconciler.sync(scanOf('Managers/A.swift', 'Views/B.swift'));

      expect(report.removed).toEqual([]);
      expect(names(manifest)).toContain('GrassIconPreview.swift');
    });

    it('keeps references of other kinds', () => {
      const { manifest, reconciler } = setup();
      reconciler.sync([]);
      expect(names(manifest)).toEqual(['Demo.app']);
      expect(childIds(manifest, 'Products')).toEqual([IDS.app]);
    });

    it('drops build files and list items that point at nothing', () => {
      const parts = standardParts();
      parts.buildFiles.push(buildFileLine('B10000000000000000000009', 'A10000000000000000000009', 'Gone.swift'));
      parts.sourcesFiles.push(listLine('B10000000000000000000009', 'Gone.swift in Sources'));
      parts.children.views.push(listLine('A10000000000000000000009', 'Gone.swift'));
      const { manifest, reconciler } = setup(renderPbxproj(parts));

      const report = reconciler.sync(scanOf('Managers/A.swift', 'Views/B.swift'));

      expect(report.orphansRemoved).toEqual(['B10000000000000000000009', 'A10000000000000000000009']);
      expect(sourceIds(manifest)).toEqual([IDS.buildA, IDS.buildB]);
      expect(childIds(manifest, 'Views')).toEqual([IDS.refB]);
      expectConsistent(manifest);
    });
  });

  describe('clean', () => {
    it('collapses duplicate names onto the first entry', () => {
      const { manifest, reconciler } = setup(renderPbxproj(duplicateParts()));

      const report = reconciler.clean();

      expect(report.deduplicated).toEqual(['D.swift']);
      expect(report.listEntriesRemoved).toBe(2);
      expect(manifest.fileReferences().filter((r) => r.name === 'D.swift').map((r) => r.id)).toEqual([REF_D1]);
      expect(manifest.buildFiles().filter((b) => b.name === 'D.swift').map((b) => b.id)).toEqual([BUILD_D1]);
      expect(childIds(manifest, 'Views')).toEqual([IDS.refB, REF_D1]);
      expect(sourceIds(manifest)).toEqual([IDS.buildA, IDS.buildB, BUILD_D1]);
      expectConsistent(manifest);
    });

    it('points list entries of removed duplicates at the kept entry', () => {
      const parts = standardParts();
      parts.fileRefs.push(fileRefLine(REF_D1, 'D.swift'), fileRefLine(REF_D2, 'D.swift'));
      parts.buildFiles.push(buildFileLine(BUILD_D1, REF_D1, 'D.swift'), buildFileLine(BUILD_D2, REF_D2, 'D.swift'));
      parts.children.models.push(listLine(REF_D2, 'D.swift'));
      parts.sourcesFiles.push(listLine(BUILD_D2, 'D.swift in Sources'));
      const { manifest, reconciler } = setup(renderPbxproj(parts));

      reconciler.clean();

      expect(childIds(manifest, 'Models')).toEqual([REF_D1]);
      expect(sourceIds(manifest)).toEqual([IDS.buildA, IDS.buildB, BUILD_D1]);
      expect(manifest.serialize()).toContain(`\t\t\t\t${BUILD_D1} /* D.swift in Sources */,`);
      expectConsistent(manifest);
    });

    it('leaves the kept entry in its own group when a duplicate is listed earlier', () => {
      const parts = standardParts();
      parts.fileRefs.push(fileRefLine(REF_D1, 'D.swift'), fileRefLine(REF_D2, 'D.swift'));
      parts.buildFiles.push(buildFileLine(BUILD_D1, REF_D1, 'D.swift'), buildFileLine(BUILD_D2, REF_D2, 'D.swift'));
      parts.children.views.push(listLine(REF_D2, 'D.swift'));
      parts.children.models.push(listLine(REF_D1, 'D.swift'));
      parts.sourcesFiles.push(listLine(BUILD_D2, 'D.swift in Sources'), listLine(BUILD_D1, 'D.swift in Sources'));
      const { manifest, reconciler } = setup(renderPbxproj(parts));

      const report = reconciler.clean();

      expect(report.listEntriesRemoved).toBe(2);
      expect(childIds(manifest, 'Models')).toEqual([REF_D1]);
      expect(childIds(manifest, 'Views')).toEqual([IDS.refB]);
      expect(sourceIds(manifest)).toEqual([IDS.buildA, IDS.buildB, BUILD_D1]);
      expectConsistent(manifest);
    });

    it('removes repeated identifiers within a list', () => {
      const parts = standardParts();
      parts.children.views.push(listLine(IDS.refB, 'B.swift'));
      parts.sourcesFiles.push(listLine(IDS.buildA, 'A.swift in Sources'));
      const { manifest, reconciler } = setup(renderPbxproj(parts));

      const report = reconciler.clean();

      expect(report.listEntriesRemoved).toBe(2);
      expect(childIds(manifest, 'Views')).toEqual([IDS.refB]);
      expect(sourceIds(manifest)).toEqual([IDS.buildA, IDS.buildB]);
    });

    it('keeps a file in the first group that lists it', () => {
      const parts = standardParts();
      parts.children.views.push(listLine(IDS.refA, 'A.swift'));
      const { manifest, reconciler } = setup(renderPbxproj(parts));

      reconciler.clean();

      expect(childIds(manifest, 'Managers')).toEqual([IDS.refA]);
      expect(childIds(manifest, 'Views')).toEqual([IDS.refB]);
    });

    it('drops a repeated declaration of the same identifier', () => {
      const parts = standardParts();
      parts.fileRefs.push(fileRefLine(IDS.refA, 'A.swift'));
      parts.buildFiles.push(buildFileLine(IDS.buildA, IDS.refA, 'A.swift'));
      const { manifest, reconciler } = setup(renderPbxproj(parts));

      reconciler.clean();

      expect(manifest.fileReferences().filter((r) => r.id === IDS.refA)).toHaveLength(1);
      expect(manifest.buildFiles().filter((b) => b.id === IDS.buildA)).toHaveLength(1);
      expect(childIds(manifest, 'Managers')).toEqual([IDS.refA]);
      expectConsistent(manifest);
    });

    it('changes nothing on a second run', () => {
      const { manifest, reconciler } = setup(renderPbxproj(duplicateParts()));
      reconciler.clean();
      const first = manifest.serialize();

      expect(isReportEmpty(reconciler.clean())).toBe(true);
      expect(manifest.serialize()).toBe(first);
    });

    it('leaves a clean project byte-identical', () => {
      const text = renderPbxproj();
      const { manifest, reconciler } = setup(text);
      expect(isReportEmpty(reconciler.clean())).toBe(true);
      expect(manifest.serialize()).toBe(text);
    });
  });

  describe('rebuild', () => {
    it('reproduces a consistent project exactly', () => {
      const text = renderPbxproj();
      const { manifest, reconciler } = setup(text);

      const report = reconciler.rebuild(scanOf('Managers/A.swift', 'Views/B.swift'));

      expect(report.removed).toEqual(['A.swift', 'B.swift']);
      expect(report.added).toEqual(['A.swift', 'B.swift']);
      expect(manifest.serialize()).toBe(text);
    });

    it('discards duplicates and adds new files with fresh identifiers', () => {
      const { manifest, reconciler } = setup(renderPbxproj(duplicateParts()));

      const report = reconciler.rebuild(scanOf('Managers/A.swift', 'Views/B.swift', 'Views/D.swift', 'Models/M.swift'));

      expect(report.added).toEqual(['A.swift', 'B.swift', 'D.swift', 'M.swift']);
      expect(names(manifest)).toEqual(['Demo.app', 'A.swift', 'B.swift', 'D.swift', 'M.swift']);
      expect(manifest.fileReferences().find((r) => r.name === 'D.swift')?.id).toBe(REF_D1);
      expect(manifest.fileReferences().find((r) => r.name === 'M.swift')?.id).toBe(NEW_1);
      expect(childIds(manifest, 'Views')).toEqual([IDS.refB, REF_D1]);
      expect(sourceIds(manifest)).toEqual([IDS.buildA, IDS.buildB, BUILD_D1, NEW_2]);
      expectConsistent(manifest);
    });

    it('is idempotent', () => {
      const { manifest, reconciler } = setup(renderPbxproj(duplicateParts()));
      const scan = scanOf('Managers/A.swift', 'Views/D.swift', 'Models/M.swift');

      reconciler.rebuild(scan);
      const first = manifest.serialize();
      reconciler.rebuild(scan);

      expect(manifest.serialize()).toBe(first);
    });
  });

  describe('check', () => {
    it('reports drift without changing the manifest', () => {
      const text = renderPbxproj(duplicateParts());
      const { manifest, reconciler } = setup(text);

      const drift = reconciler.check(scanOf('Managers/A.swift', 'Views/D.swift', 'Views/C.swift'));

      expect(drift).toEqual({
        missing: ['C.swift'],
        stale: ['B.swift'],
        duplicates: ['D.swift'],
        orphans: [],
      });
      expect(isInSync(drift)).toBe(false);
      expect(manifest.serialize()).toBe(text);
    });

    it('finds orphaned identifiers', () => {
      const parts = standardParts();
      parts.sourcesFiles.push(listLine('B10000000000000000000009', 'Gone.swift in Sources'));
      const { reconciler } = setup(renderPbxproj(parts));

      const drift = reconciler.check(scanOf('Managers/A.swift', 'Views/B.swift'));

      expect(drift.orphans).toEqual(['B10000000000000000000009']);
    });

    it('is in sync after sync', () => {
      const { reconciler } = setup(renderPbxproj(duplicateParts()));
      const scan = scanOf('Managers/A.swift', 'Views/D.swift', 'Models/M.swift');

      reconciler.clean();
      reconciler.sync(scan);

      expect(isInSync(reconciler.check(scan))).toBe(true);
    });
  });
});
