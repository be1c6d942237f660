/**
 * Builders for small project.pbxproj documents used across the test suite
 */

import fs from 'fs';
import os from 'os';
import path from 'path';

export const IDS = {
  project: 'F00000000000000000000001',
  mainGroup: 'F00000000000000000000002',
  managers: 'F00000000000000000000003',
  views: 'F00000000000000000000004',
  models: 'F00000000000000000000005',
  products: 'F00000000000000000000006',
  target: 'F00000000000000000000007',
  sources: 'F00000000000000000000008',
  resources: 'F00000000000000000000009',
  app: 'F0000000000000000000000A',
  refA: 'A10000000000000000000001',
  refB: 'A10000000000000000000002',
  buildA: 'B10000000000000000000001',
  buildB: 'B10000000000000000000002',
} as const;

export type GroupKey = 'managers' | 'views' | 'models';

export interface FixtureParts {
  buildFiles: string[];
  fileRefs: string[];
  children: Record<GroupKey, string[]>;
  sourcesFiles: string[];
}

export function fileRefLine(id: string, name: string, filePath: string = name): string {
  return `\t\t${id} /* ${name} */ = {isa = PBXFileReference; lastKnownFileType = sourcecode.swift; path = ${filePath}; sourceTree = "<group>"; };`;
}

export function buildFileLine(id: string, fileRef: string, name: string): string {
  return `\t\t${id} /* ${name} in Sources */ = {isa = PBXBuildFile; fileRef = ${fileRef} /* ${name} */; };`;
}

export function listLine(id: string, comment: string): string {
  return `\t\t\t\t${id} /* ${comment} */,`;
}

/**
 * A.swift in Managers, B.swift in Views, Models empty
 */
export function standardParts(): FixtureParts {
  return {
    buildFiles: [buildFileLine(IDS.buildA, IDS.refA, 'A.swift'), buildFileLine(IDS.buildB, IDS.refB, 'B.swift')],
    fileRefs: [fileRefLine(IDS.refA, 'A.swift'), fileRefLine(IDS.refB, 'B.swift')],
    children: {
      managers: [listLine(IDS.refA, 'A.swift')],
      views: [listLine(IDS.refB, 'B.swift')],
      models: [],
    },
    sourcesFiles: [listLine(IDS.buildA, 'A.swift in Sources'), listLine(IDS.buildB, 'B.swift in Sources')],
  };
}

function groupBlock(id: string, name: string, children: string[]): string[] {
  return [
    `\t\t${id} /* ${name} */ = {`,
    '\t\t\tisa = PBXGroup;',
    '\t\t\tchildren = (',
    ...children,
    '\t\t\t);',
    `\t\t\tpath = ${name};`,
    '\t\t\tsourceTree = "<group>";',
    '\t\t};',
  ];
}

export function renderPbxproj(parts: FixtureParts = standardParts()): string {
  const lines = [
    '// !$*UTF8*$!',
    '{',
    '\tarchiveVersion = 1;',
    '\tclasses = {',
    '\t};',
    '\tobjectVersion = 56;',
    '\tobjects = {',
    '',
    '/* Begin PBXBuildFile section */',
    ...parts.buildFiles,
    '/* End PBXBuildFile section */',
    '',
    '/* Begin PBXFileReference section */',
    `\t\t${IDS.app} /* Demo.app */ = {isa = PBXFileReference; explicitFileType = wrapper.application; includeInIndex = 0; path = Demo.app; sourceTree = BUILT_PRODUCTS_DIR; };`,
    ...parts.fileRefs,
    '/* End PBXFileReference section */',
    '',
    '/* Begin PBXGroup section */',
    `\t\t${IDS.mainGroup} = {`,
    '\t\t\tisa = PBXGroup;',
    '\t\t\tchildren = (',
    listLine(IDS.managers, 'Managers'),
    listLine(IDS.views, 'Views'),
    listLine(IDS.models, 'Models'),
    listLine(IDS.products, 'Products'),
    '\t\t\t);',
    '\t\t\tsourceTree = "<group>";',
    '\t\t};',
    ...groupBlock(IDS.managers, 'Managers', parts.children.managers),
    ...groupBlock(IDS.views, 'Views', parts.children.views),
    ...groupBlock(IDS.models, 'Models', parts.children.models),
    `\t\t${IDS.products} /* Products */ = {`,
    '\t\t\tisa = PBXGroup;',
    '\t\t\tchildren = (',
    listLine(IDS.app, 'Demo.app'),
    '\t\t\t);',
    '\t\t\tname = Products;',
    '\t\t\tsourceTree = "<group>";',
    '\t\t};',
    '/* End PBXGroup section */',
    '',
    '/* Begin PBXNativeTarget section */',
    `\t\t${IDS.target} /* Demo */ = {`,
    '\t\t\tisa = PBXNativeTarget;',
    '\t\t\tbuildPhases = (',
    `\t\t\t\t${IDS.sources} /* Sources */,`,
    `\t\t\t\t${IDS.resources} /* Resources */,`,
    '\t\t\t);',
    '\t\t\tname = Demo;',
    `\t\t\tproductReference = ${IDS.app} /* Demo.app */;`,
    '\t\t\tproductType = "com.apple.product-type.application";',
    '\t\t};',
    '/* End PBXNativeTarget section */',
    '',
    '/* Begin PBXProject section */',
    `\t\t${IDS.project} /* Project object */ = {`,
    '\t\t\tisa = PBXProject;',
    `\t\t\tmainGroup = ${IDS.mainGroup};`,
    `\t\t\tproductRefGroup = ${IDS.products} /* Products */;`,
    '\t\t\ttargets = (',
    `\t\t\t\t${IDS.target} /* Demo */,`,
    '\t\t\t);',
    '\t\t};',
    '/* End PBXProject section */',
    '',
    '/* Begin PBXResourcesBuildPhase section */',
    `\t\t${IDS.resources} /* Resources */ = {`,
    '\t\t\tisa = PBXResourcesBuildPhase;',
    '\t\t\tbuildActionMask = 2147483647;',
    '\t\t\tfiles = (',
    '\t\t\t);',
    '\t\t\trunOnlyForDeploymentPostprocessing = 0;',
    '\t\t};',
    '/* End PBXResourcesBuildPhase section */',
    '',
    '/* Begin PBXSourcesBuildPhase section */',
    `\t\t${IDS.sources} /* Sources */ = {`,
    '\t\t\tisa = PBXSourcesBuildPhase;',
    '\t\t\tbuildActionMask = 2147483647;',
    '\t\t\tfiles = (',
    ...parts.sourcesFiles,
    '\t\t\t);',
    '\t\t\trunOnlyForDeploymentPostprocessing = 0;',
    '\t\t};',
    '/* End PBXSourcesBuildPhase section */',
    '\t};',
    `\trootObject = ${IDS.project} /* Project object */;`,
    '}',
    '',
  ];
  return lines.join('\n');
}

/**
 * Temporary repository with Demo.xcodeproj/project.pbxproj and the given
 * source files (contents are irrelevant)
 */
export function createTempProject(files: string[], pbxproj: string = renderPbxproj()): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'pbxsync-test-'));
  const bundle = path.join(root, 'Demo.xcodeproj');
  fs.mkdirSync(bundle);
  fs.writeFileSync(path.join(bundle, 'project.pbxproj'), pbxproj);
  for (const file of files) {
    const absolute = path.join(root, file);
    fs.mkdirSync(path.dirname(absolute), { recursive: true });
    fs.writeFileSync(absolute, '// test\n');
  }
  return root;
}

export function manifestPathOf(root: string): string {
  return path.join(root, 'Demo.xcodeproj', 'project.pbxproj');
}

export function removeTempProject(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}
