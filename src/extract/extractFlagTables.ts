import ts from 'typescript';
import path from 'node:path';

import type { ReportFinding, ReportSeverity } from '../report/checkReport';
import { scanTypeScriptSources } from '../scan/sourceScanner';
import { toPosix } from '../scan/tableScanner';
import { COUNTS, VISIBILITIES, type AliasTag, type AppInfo, type Count, type Visibility } from '../schema/types';
import type { FieldSpec, FlagTable, ValueType } from '../table/flagTable';
import { createExtractProgram } from './createProgram';

export type ExtractOptions = {
  projectRoot: string;
  tsconfigPath?: string;
  excludeGlobs?: string[];
};

export type ExtractedTable = {
  /** Source file declaring the root interface, relative to projectRoot. */
  file: string;
  table: FlagTable;
};

export type ExtractResult = {
  filesScanned: number;
  tables: ExtractedTable[];
  findings: ReportFinding[];
};

type FieldType =
  | { kind: 'SCALAR'; type: ValueType; optional: boolean; multiple: boolean }
  | { kind: 'STRUCT'; decl: ts.InterfaceDeclaration }
  | { kind: 'UNSUPPORTED'; reason: string };

type Tags = Map<string, string[]>;

const ROLE_TAGS = ['flag', 'positional', 'subcommand', 'group'] as const;
type RoleTag = (typeof ROLE_TAGS)[number];

function isCount(s: string): s is Count {
  return COUNTS.some((c) => c === s);
}

function isVisibility(s: string): s is Visibility {
  return VISIBILITIES.some((v) => v === s);
}

function entityText(name: ts.EntityName): string {
  return ts.isIdentifier(name) ? name.text : `${entityText(name.left)}.${name.right.text}`;
}

/** `@arg` is a JSDoc synonym of `@param`, so its label is parsed as the parameter name. */
function tagText(tag: ts.JSDocTag): string {
  const comment = ts.getTextOfJSDocComment(tag.comment) ?? '';
  if (ts.isJSDocParameterTag(tag)) return `${entityText(tag.name)} ${comment}`.trim();
  return comment.trim();
}

function readTags(node: ts.Node): Tags {
  const out: Tags = new Map();
  for (const tag of ts.getJSDocTags(node)) {
    const name = tag.tagName.text;
    out.set(name, [...(out.get(name) ?? []), tagText(tag)]);
  }
  return out;
}

function docText(node: ts.Node): string {
  return ts
    .getJSDocCommentsAndTags(node)
    .filter(ts.isJSDoc)
    .map((d) => ts.getTextOfJSDocComment(d.comment) ?? '')
    .filter((t) => t !== '')
    .join('\n')
    .trim();
}

function lastTag(tags: Tags, name: string): string | undefined {
  const values = tags.get(name);
  return values ? values[values.length - 1] : undefined;
}

class FlagTableExtractor {
  readonly findings: ReportFinding[] = [];
  private readonly stack = new Set<ts.InterfaceDeclaration>();

  constructor(
    private readonly checker: ts.TypeChecker,
    private readonly projectRoot: string,
  ) {}

  report(node: ts.Node, severity: ReportSeverity, message: string): void {
    const sf = node.getSourceFile();
    const lc = ts.getLineAndCharacterOfPosition(sf, node.getStart(sf, false));
    this.findings.push({
      kind: 'extractProblem',
      severity,
      message,
      location: { file: toPosix(path.relative(this.projectRoot, sf.fileName)), line: lc.line + 1, column: lc.character + 1 },
    });
  }

  table(decl: ts.InterfaceDeclaration): FlagTable {
    const table: FlagTable = { schema: 'flag-table-v1', name: decl.name.text, fields: this.fields(decl) };
    const app = this.app(decl);
    if (Object.keys(app).length > 0) table.app = app;
    return table;
  }

  private app(decl: ts.InterfaceDeclaration): AppInfo {
    const tags = readTags(decl);
    const app: AppInfo = {};
    const name = lastTag(tags, 'app');
    if (name) app.name = name;
    const about = lastTag(tags, 'about');
    if (about) app.about = about;
    const version = lastTag(tags, 'version');
    if (version) app.version = version;
    const url = lastTag(tags, 'url');
    if (url) app.url = url;
    const authors = lastTag(tags, 'authors');
    if (authors) app.authors = authors;
    const license = lastTag(tags, 'license');
    if (license) app.license = license;
    const year = lastTag(tags, 'copyright');
    if (year !== undefined) {
      if (/^\d+$/.test(year)) app.copyrightYear = Number(year);
      else this.report(decl, 'warning', `${decl.name.text}: @copyright expects a year, got ${JSON.stringify(year)}`);
    }
    return app;
  }

  private fields(decl: ts.InterfaceDeclaration): FieldSpec[] {
    if (this.stack.has(decl)) {
      this.report(decl, 'error', `${decl.name.text} contains itself`);
      return [];
    }
    this.stack.add(decl);
    const out: FieldSpec[] = [];
    for (const member of decl.members) {
      if (!ts.isPropertySignature(member)) {
        this.report(member, 'warning', `${decl.name.text}: only properties become fields`);
        continue;
      }
      const spec = this.field(decl, member);
      if (spec) out.push(spec);
    }
    this.stack.delete(decl);
    return out;
  }

  private field(owner: ts.InterfaceDeclaration, prop: ts.PropertySignature): FieldSpec | undefined {
    if (!ts.isIdentifier(prop.name) && !ts.isStringLiteral(prop.name)) {
      this.report(prop, 'warning', `${owner.name.text}: computed property names are not supported`);
      return undefined;
    }
    const field = prop.name.text;
    const origin = `${owner.name.text}.${field}`;
    const tags = readTags(prop);
    const type = this.fieldType(prop);
    if (type.kind === 'UNSUPPORTED') {
      this.report(prop, 'error', `${origin}: ${type.reason}`);
      return undefined;
    }

    const roles = ROLE_TAGS.filter((r) => tags.has(r));
    if (roles.length > 1) {
      this.report(prop, 'error', `${origin} has more than one role (${roles.map((r) => `@${r}`).join(', ')})`);
      return undefined;
    }
    const role: RoleTag = roles[0] ?? (type.kind === 'STRUCT' ? 'group' : 'positional');
    const nested = role === 'subcommand' || role === 'group';
    if (nested !== (type.kind === 'STRUCT')) {
      this.report(prop, 'error', `${origin}: @${role} does not fit its type`);
      return undefined;
    }

    const help = docText(prop);
    const spec: FieldSpec = { field, role: 'FLAG' };
    if (help) spec.help = help;
    const name = lastTag(tags, 'name');
    if (name) spec.name = name;
    const count = this.count(prop, origin, tags);
    const visibility = this.visibility(prop, origin, lastTag(tags, 'visibility'));
    const aliases = this.aliases(prop, origin, tags);

    if (type.kind === 'STRUCT') {
      spec.role = role === 'subcommand' ? 'SUBCOMMAND' : 'GROUP';
      spec.struct = type.decl.name.text;
      if (visibility) spec.visibility = visibility;
      if (aliases.length > 0) spec.aliases = aliases;
      if (spec.role === 'SUBCOMMAND') {
        const about = lastTag(tags, 'about');
        if (about) spec.about = about;
      } else {
        const letter = lastTag(tags, 'letter');
        if (letter) spec.letter = letter;
      }
      spec.fields = this.fields(type.decl);
      return spec;
    }

    spec.role = role === 'flag' ? 'FLAG' : 'POSITIONAL';
    spec.type = type.type === 'string' && tags.has('rune') ? 'rune' : type.type;
    if (type.optional) spec.optional = true;
    if (type.multiple) spec.multiple = true;
    if (count) spec.count = count;
    if (spec.role === 'FLAG') {
      const letter = lastTag(tags, 'letter');
      if (letter) spec.letter = letter;
      const arg = lastTag(tags, 'arg');
      if (arg) spec.arg = arg;
      if (visibility) spec.visibility = visibility;
      if (aliases.length > 0) spec.aliases = aliases;
    }
    return spec;
  }

  private count(node: ts.Node, origin: string, tags: Tags): Count | undefined {
    const raw = lastTag(tags, 'count');
    if (raw === undefined) return undefined;
    if (isCount(raw)) return raw;
    this.report(node, 'warning', `${origin}: unknown count ${JSON.stringify(raw)}`);
    return undefined;
  }

  private visibility(node: ts.Node, origin: string, raw: string | undefined): Visibility | undefined {
    if (raw === undefined) return undefined;
    if (isVisibility(raw)) return raw;
    this.report(node, 'warning', `${origin}: unknown visibility ${JSON.stringify(raw)}`);
    return undefined;
  }

  /** `@alias <name> [visibility]`, repeatable. */
  private aliases(node: ts.Node, origin: string, tags: Tags): AliasTag[] {
    const out: AliasTag[] = [];
    for (const raw of tags.get('alias') ?? []) {
      const [name, vis] = raw.split(/\s+/);
      if (!name) {
        this.report(node, 'warning', `${origin}: @alias needs a name`);
        continue;
      }
      const alias: AliasTag = { name };
      const visibility = this.visibility(node, origin, vis);
      if (visibility) alias.visibility = visibility;
      out.push(alias);
    }
    return out;
  }

  private fieldType(prop: ts.PropertySignature): FieldType {
    if (!prop.type) return { kind: 'UNSUPPORTED', reason: 'missing type annotation' };
    let node: ts.TypeNode = prop.type;
    let optional = Boolean(prop.questionToken);
    let multiple = false;

    if (ts.isUnionTypeNode(node)) {
      const rest = node.types.filter(
        (t) =>
          t.kind !== ts.SyntaxKind.UndefinedKeyword &&
          !(ts.isLiteralTypeNode(t) && t.literal.kind === ts.SyntaxKind.NullKeyword),
      );
      if (rest.length !== 1) return { kind: 'UNSUPPORTED', reason: 'union types are not supported' };
      optional = optional || rest.length !== node.types.length;
      node = rest[0];
    }
    if (ts.isParenthesizedTypeNode(node)) node = node.type;

    if (ts.isArrayTypeNode(node)) {
      multiple = true;
      node = node.elementType;
    } else if (
      ts.isTypeReferenceNode(node) &&
      ts.isIdentifier(node.typeName) &&
      node.typeName.text === 'Array' &&
      node.typeArguments?.length === 1
    ) {
      multiple = true;
      node = node.typeArguments[0];
    }

    switch (node.kind) {
      case ts.SyntaxKind.BooleanKeyword:
        return { kind: 'SCALAR', type: 'bool', optional, multiple };
      case ts.SyntaxKind.NumberKeyword:
        return { kind: 'SCALAR', type: 'int', optional, multiple };
      case ts.SyntaxKind.StringKeyword:
        return { kind: 'SCALAR', type: 'string', optional, multiple };
    }

    if (ts.isTypeReferenceNode(node)) {
      const decl = this.interfaceOf(node.typeName);
      if (!decl) return { kind: 'UNSUPPORTED', reason: `${entityText(node.typeName)} is not an interface` };
      if (optional || multiple) return { kind: 'UNSUPPORTED', reason: 'nested structs cannot be optional or lists' };
      return { kind: 'STRUCT', decl };
    }
    return { kind: 'UNSUPPORTED', reason: `unsupported type ${node.getText()}` };
  }

  private interfaceOf(name: ts.EntityName): ts.InterfaceDeclaration | undefined {
    let symbol = this.checker.getSymbolAtLocation(name);
    if (symbol && symbol.flags & ts.SymbolFlags.Alias) symbol = this.checker.getAliasedSymbol(symbol);
    return symbol?.declarations?.find(ts.isInterfaceDeclaration);
  }
}

/**
 * Turns every interface tagged `@flags` into a flag table. Problems are
 * returned as findings; nothing here throws on user code.
 */
export async function extractFlagTables(opts: ExtractOptions): Promise<ExtractResult> {
  const projectRoot = path.resolve(opts.projectRoot);
  const files = await scanTypeScriptSources({ sourceRoot: projectRoot, excludeGlobs: opts.excludeGlobs });
  const { program, checker } = createExtractProgram({
    projectRoot,
    rootNames: files.map((f) => path.join(projectRoot, f)),
    tsconfigPath: opts.tsconfigPath,
  });

  const extractor = new FlagTableExtractor(checker, projectRoot);
  const tables: ExtractedTable[] = [];
  for (const file of files) {
    const sf = program.getSourceFile(path.join(projectRoot, file));
    if (!sf) continue;
    for (const stmt of sf.statements) {
      if (!ts.isInterfaceDeclaration(stmt) || !readTags(stmt).has('flags')) continue;
      tables.push({ file, table: extractor.table(stmt) });
    }
  }

  tables.sort((a, b) => (a.table.name < b.table.name ? -1 : a.table.name > b.table.name ? 1 : 0));
  return { filesScanned: files.length, tables, findings: extractor.findings };
}
