// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { readFile, writeFile } from 'fs/promises';
import { Document, isMap, isNode, isPair, isScalar, isSeq, LineCounter, Pair, parseDocument, Scalar, YAMLMap, YAMLSeq } from 'yaml';
import { knownArch, knownOS } from '../asset/platforms';
import { repositoryPattern } from '../constants';
import { i } from '../i18n';
import { ErrorKind } from '../interfaces/error-kind';
import { Validation } from '../interfaces/validation';
import { SourceRange, ValidationMessage } from '../interfaces/validation-message';
import { ConfigurationError } from '../util/exceptions';
import { isAlgorithm } from '../util/hash';
import { Coerce } from '../yaml/Coerce';
import { AssetConfig, AssetRule, Binary, ChecksumConfig, EmbeddedChecksum, InstallSpec, NamingConvention, Platform } from './install-spec';
import { binDirSafetyProblem, shellSafetyProblem } from './shell-safe';

type Node = YAMLMap<unknown, unknown>;
type Check = (value: string, field: string) => string | undefined;

const topLevelKeys = ['schema', 'name', 'repo', 'default_version', 'default_bin_dir', 'asset', 'checksums', 'unpack', 'supported_platforms', 'attestation'];
const assetKeys = ['template', 'default_extension', 'binaries', 'rules', 'naming_convention', 'arch_emulation'];
const ruleKeys = ['when', 'os', 'arch', 'ext', 'template', 'binaries'];
const checksumKeys = ['algorithm', 'template', 'embedded_checksums'];

function keyOf(pair: Pair<unknown, unknown>): string | undefined {
  return isScalar(pair.key) ? Coerce.String(pair.key) : typeof pair.key === 'string' ? pair.key : undefined;
}

function findPair(map: Node, key: string): Pair<unknown, unknown> | undefined {
  return map.items.find(pair => keyOf(pair) === key);
}

function rangeOf(node: unknown): SourceRange | undefined {
  return isNode(node) && node.range ? node.range : undefined;
}

const repository: Check = (value, field) =>
  repositoryPattern.test(value) ? undefined : i`${field} must be in the form 'owner/name', found '${value}'`;

/** walks the parsed document, building the typed spec and collecting everything wrong with it */
class SpecReader {
  readonly messages = new Array<ValidationMessage>();

  private report(category: ErrorKind, message: string, node?: unknown) {
    this.messages.push({ category, message, range: rangeOf(node) });
  }

  private keys(map: Node, allowed: ReadonlyArray<string>, path: string) {
    for (const pair of map.items) {
      const key = keyOf(pair);
      if (key === undefined || !allowed.includes(key)) {
        this.report(ErrorKind.UnknownKey, i`Unexpected key '${key ?? String(pair.key)}' in ${path}`, pair.key);
      }
    }
  }

  private present(map: Node, key: string): Pair<unknown, unknown> | undefined {
    const pair = findPair(map, key);
    return pair && !Coerce.IsNull(pair.value) ? pair : undefined;
  }

  private string(map: Node, key: string, path: string, ...checks: Array<Check>): string | undefined {
    const pair = this.present(map, key);
    if (!pair) {
      return undefined;
    }
    const value = Coerce.String(pair.value);
    if (value === undefined) {
      this.report(ErrorKind.IncorrectType, i`${path}.${key} should be a string`, pair.value);
      return undefined;
    }
    for (const check of checks) {
      const problem = check(value, `${path}.${key}`);
      if (problem) {
        this.report(check === repository ? ErrorKind.InvalidValue : ErrorKind.UnsafeValue, problem, pair.value);
      }
    }
    return value;
  }

  private boolean(map: Node, key: string, path: string): boolean | undefined {
    const pair = this.present(map, key);
    if (!pair) {
      return undefined;
    }
    const value = Coerce.Boolean(pair.value);
    if (value === undefined) {
      this.report(ErrorKind.IncorrectType, i`${path}.${key} should be true or false`, pair.value);
    }
    return value;
  }

  private integer(map: Node, key: string, path: string): number | undefined {
    const pair = this.present(map, key);
    if (!pair) {
      return undefined;
    }
    const value = Coerce.Number(pair.value);
    if (value === undefined || !Number.isInteger(value) || value < 0) {
      this.report(ErrorKind.IncorrectType, i`${path}.${key} should be a non-negative integer`, pair.value);
      return undefined;
    }
    return value;
  }

  private map(map: Node, key: string, path: string, allowed: ReadonlyArray<string>): Node | undefined {
    const pair = this.present(map, key);
    if (!pair) {
      return undefined;
    }
    if (!isMap(pair.value)) {
      this.report(ErrorKind.IncorrectType, i`${path}.${key} should be a map`, pair.value);
      return undefined;
    }
    this.keys(pair.value, allowed, `${path}.${key}`);
    return pair.value;
  }

  private sequence<T>(map: Node, key: string, path: string, read: (item: Node, path: string) => T): Array<T> | undefined {
    const pair = this.present(map, key);
    if (!pair) {
      return undefined;
    }
    if (!isSeq(pair.value)) {
      this.report(ErrorKind.IncorrectType, i`${path}.${key} should be a sequence`, pair.value);
      return undefined;
    }
    const result = new Array<T>();
    pair.value.items.forEach((item, index) => {
      if (isMap(item)) {
        result.push(read(item, `${path}.${key}[${index}]`));
      } else {
        this.report(ErrorKind.IncorrectType, i`${path}.${key}[${index}] should be a map`, item);
      }
    });
    return result;
  }

  read(root: unknown): InstallSpec {
    if (Coerce.IsNull(root)) {
      return {};
    }
    if (!isMap(root)) {
      this.report(ErrorKind.IncorrectType, i`The install spec should be a map`, root);
      return {};
    }
    const path = 'spec';
    this.keys(root, topLevelKeys, path);

    const repo = this.string(root, 'repo', path, shellSafetyProblem, repository);
    if (repo === undefined && !findPair(root, 'repo')) {
      this.report(ErrorKind.FieldMissing, i`Missing repository '${'repo'}'`, root);
    }

    const asset = this.map(root, 'asset', path, assetKeys);
    const checksums = this.map(root, 'checksums', path, checksumKeys);
    const unpack = this.map(root, 'unpack', path, ['strip_components']);

    return {
      schema: this.string(root, 'schema', path),
      name: this.string(root, 'name', path, shellSafetyProblem),
      repo,
      defaultVersion: this.string(root, 'default_version', path, shellSafetyProblem),
      defaultBinDir: this.string(root, 'default_bin_dir', path, binDirSafetyProblem),
      asset: asset ? this.asset(asset) : undefined,
      checksums: checksums ? this.checksums(checksums) : undefined,
      unpack: unpack ? { stripComponents: this.integer(unpack, 'strip_components', `${path}.unpack`) } : undefined,
      supportedPlatforms: this.sequence(root, 'supported_platforms', path, (item, at) => this.platform(item, at)),
    };
  }

  private asset(map: Node): AssetConfig {
    const path = 'asset';
    const template = this.string(map, 'template', path, shellSafetyProblem);
    if (template === undefined) {
      this.report(ErrorKind.FieldMissing, i`Missing asset template '${'asset.template'}'`, map);
    }
    const emulation = this.map(map, 'arch_emulation', path, ['rosetta2']);
    const naming = this.map(map, 'naming_convention', path, ['os', 'arch']);

    return {
      template,
      defaultExtension: this.string(map, 'default_extension', path, shellSafetyProblem),
      binaries: this.sequence(map, 'binaries', path, (item, at) => this.binary(item, at)),
      rules: this.sequence(map, 'rules', path, (item, at) => this.rule(item, at)),
      namingConvention: naming ? this.naming(naming) : undefined,
      archEmulation: emulation ? { rosetta2: this.boolean(emulation, 'rosetta2', `${path}.arch_emulation`) } : undefined,
    };
  }

  private naming(map: Node): NamingConvention {
    const path = 'asset.naming_convention';
    const result: NamingConvention = {};
    const os = this.string(map, 'os', path);
    if (os === 'lowercase' || os === 'titlecase') {
      result.os = os;
    } else if (os !== undefined) {
      this.report(ErrorKind.InvalidValue, i`${path}.os must be 'lowercase' or 'titlecase', found '${os}'`, findPair(map, 'os')?.value);
    }
    const arch = this.string(map, 'arch', path);
    if (arch === 'lowercase') {
      result.arch = arch;
    } else if (arch !== undefined) {
      this.report(ErrorKind.InvalidValue, i`${path}.arch must be 'lowercase', found '${arch}'`, findPair(map, 'arch')?.value);
    }
    return result;
  }

  private binary(map: Node, path: string): Binary {
    this.keys(map, ['name', 'path'], path);
    const name = this.string(map, 'name', path, shellSafetyProblem);
    if (name === undefined) {
      this.report(ErrorKind.FieldMissing, i`Missing binary name '${`${path}.name`}'`, map);
    }
    return { name: name ?? '', path: this.string(map, 'path', path, shellSafetyProblem) ?? name ?? '' };
  }

  private rule(map: Node, path: string): AssetRule {
    this.keys(map, ruleKeys, path);
    const when = this.map(map, 'when', path, ['os', 'arch']);
    return {
      when: when ? { os: this.string(when, 'os', `${path}.when`, shellSafetyProblem), arch: this.string(when, 'arch', `${path}.when`, shellSafetyProblem) } : undefined,
      os: this.string(map, 'os', path, shellSafetyProblem),
      arch: this.string(map, 'arch', path, shellSafetyProblem),
      ext: this.string(map, 'ext', path, shellSafetyProblem),
      template: this.string(map, 'template', path, shellSafetyProblem),
      binaries: this.sequence(map, 'binaries', path, (item, at) => this.binary(item, at)),
    };
  }

  private checksums(map: Node): ChecksumConfig {
    const path = 'checksums';
    const result: ChecksumConfig = {
      template: this.string(map, 'template', path, shellSafetyProblem),
    };
    const algorithm = this.string(map, 'algorithm', path);
    if (isAlgorithm(algorithm)) {
      result.algorithm = algorithm;
    } else if (algorithm !== undefined) {
      this.report(ErrorKind.InvalidValue, i`Unsupported checksum algorithm '${algorithm}' (expected sha256, sha512, sha1 or md5)`, findPair(map, 'algorithm')?.value);
    }

    const embedded = this.present(map, 'embedded_checksums');
    if (embedded) {
      if (isMap(embedded.value)) {
        result.embeddedChecksums = new Map<string, Array<EmbeddedChecksum>>();
        for (const pair of embedded.value.items) {
          const version = keyOf(pair);
          if (version === undefined) {
            this.report(ErrorKind.IncorrectType, i`Embedded checksum versions should be strings`, pair.key);
            continue;
          }
          const at = `${path}.embedded_checksums.${version}`;
          if (!isSeq(pair.value)) {
            this.report(ErrorKind.IncorrectType, i`${at} should be a sequence`, pair.value);
            continue;
          }
          const entries = new Array<EmbeddedChecksum>();
          for (const item of pair.value.items) {
            if (!isMap(item)) {
              this.report(ErrorKind.IncorrectType, i`${at} entries should be maps`, item);
              continue;
            }
            const filename = this.string(item, 'filename', at, shellSafetyProblem);
            const hash = this.string(item, 'hash', at, shellSafetyProblem);
            if (filename && hash) {
              entries.push({ filename, hash });
            } else {
              this.report(ErrorKind.FieldMissing, i`${at} entries need a filename and a hash`, item);
            }
          }
          result.embeddedChecksums.set(version, entries);
        }
      } else {
        this.report(ErrorKind.IncorrectType, i`${path}.embedded_checksums should be a map`, embedded.value);
      }
    }
    return result;
  }

  private platform(map: Node, path: string): Platform {
    this.keys(map, ['os', 'arch'], path);
    const os = this.string(map, 'os', path) ?? '';
    const arch = this.string(map, 'arch', path) ?? '';
    if (!knownOS.includes(os)) {
      this.report(ErrorKind.InvalidValue, i`${path}.os '${os}' is not a known operating system`, findPair(map, 'os')?.value ?? map);
    }
    if (!knownArch.includes(arch)) {
      this.report(ErrorKind.InvalidValue, i`${path}.arch '${arch}' is not a known architecture`, findPair(map, 'arch')?.value ?? map);
    }
    return { os, arch };
  }
}

/** merges the checksum configuration into the `checksums` node, keeping whatever else (and any comments) it holds */
function mergeChecksums(subtree: Node, config: ChecksumConfig) {
  subtree.set('algorithm', config.algorithm ?? 'sha256');
  if (config.template) {
    subtree.set('template', config.template);
  }

  const existing = findPair(subtree, 'embedded_checksums');
  const embedded = config.embeddedChecksums;
  if (!embedded?.size) {
    if (existing) {
      subtree.delete('embedded_checksums');
    }
    return;
  }

  const versions = existing && isMap(existing.value) ? existing.value : new YAMLMap<unknown, unknown>();
  versions.items = versions.items.filter(pair => {
    const version = keyOf(pair);
    return version !== undefined && embedded.has(version);
  });

  for (const [version, checksums] of embedded) {
    const list = new YAMLSeq<unknown>();
    for (const each of checksums) {
      const entry = new YAMLMap<unknown, unknown>();
      entry.set('filename', each.filename);
      entry.set('hash', each.hash);
      list.add(entry);
    }
    const pair = findPair(versions, version);
    if (pair) {
      pair.value = list;
    } else {
      versions.add(new Pair(new Scalar(version), list));
    }
  }

  if (existing) {
    existing.value = versions;
  } else {
    subtree.set('embedded_checksums', versions);
  }
}

/**
 * Where the content of a block node ends.
 *
 * Comment lines after the last entry are attached to the innermost collection, whatever their indentation; they are
 * detached here so they stay in the source text that follows the node.
 */
function contentEnd(node: unknown): number | undefined {
  if (isMap(node) || isSeq(node)) {
    node.comment = undefined;
    const last: unknown = node.items[node.items.length - 1];
    const end = isPair(last) ? contentEnd(last.value) ?? rangeOf(last.key)?.[2] : contentEnd(last);
    return end ?? rangeOf(node)?.[2];
  }
  return rangeOf(node)?.[2];
}

/** renders `checksums:` and its subtree as a block, without a trailing newline */
function renderChecksums(subtree: Node, eol: string): string {
  const top = new YAMLMap<unknown, unknown>();
  top.set('checksums', subtree);
  return new Document(top).toString().replace(/\n+$/, '').replace(/\n/g, eol);
}

/**
 * An install spec as it sits on disk.
 *
 * Keeps the YAML source so that writing checksums back only touches the `checksums` subtree.
 */
export class InstallSpecFile implements Validation {
  #source: string;
  #document: Document.Parsed;
  #lineCounter: LineCounter;
  #read?: { spec: InstallSpec, messages: Array<ValidationMessage> };

  private constructor(public readonly filename: string, source: string) {
    this.#source = source;
    this.#lineCounter = new LineCounter();
    this.#document = parseDocument(source, { prettyErrors: false, lineCounter: this.#lineCounter, strict: true });
  }

  static parse(filename: string, content: string): InstallSpecFile {
    return new InstallSpecFile(filename, content);
  }

  static async load(filename: string): Promise<InstallSpecFile> {
    let content: string;
    try {
      content = await readFile(filename, 'utf8');
    } catch (e) {
      throw new ConfigurationError(i`Unable to read install spec ${filename}`, { cause: e });
    }
    return InstallSpecFile.parse(filename, content);
  }

  #reader() {
    if (!this.#read) {
      const reader = new SpecReader();
      const spec = reader.read(this.#document.contents);
      this.#read = { spec, messages: reader.messages };
    }
    return this.#read;
  }

  /** the typed spec; the same object is returned until the document changes */
  get spec(): InstallSpec {
    return this.#reader().spec;
  }

  get isFormatValid(): boolean {
    return this.#document.errors.length === 0;
  }

  get formatErrors(): Array<string> {
    return this.#document.errors.map(each => {
      const { line, col } = this.#lineCounter.linePos(each.pos[0]);
      return this.formatMessage(each.name, each.message, line, col);
    });
  }

  /** @internal */
  *validate(): Iterable<ValidationMessage> {
    for (const each of this.#document.errors) {
      yield { message: each.message, range: [each.pos[0], each.pos[1], each.pos[1]], category: ErrorKind.ParseError };
    }
    yield* this.#reader().messages;
  }

  /** @internal */ formatMessage(category: ErrorKind | string, message: string, line?: number, column?: number): string {
    if (line !== undefined && column !== undefined) {
      return `${this.filename}:${line}:${column} ${category}, ${message}`;
    } else {
      return `${this.filename}: ${category}, ${message}`;
    }
  }

  formatVMessage(vMessage: ValidationMessage): string {
    if (!vMessage.range) {
      return this.formatMessage(vMessage.category, vMessage.message);
    }
    const { line, col } = this.#lineCounter.linePos(vMessage.range[0]);
    return this.formatMessage(vMessage.category, vMessage.message, line, col);
  }

  /**
   * Writes the checksum configuration into the document.
   *
   * An existing `checksums` block is replaced in place; otherwise one is appended. All text outside that block is kept as it was.
   */
  setChecksums(config: ChecksumConfig) {
    const root = this.#document.contents;
    const block = isMap(root) && !root.flow;
    const eol = this.#source.includes('\r\n') ? '\r\n' : '\n';
    const pair = isMap(root) ? findPair(root, 'checksums') : undefined;
    const keyRange = pair && isScalar(pair.key) ? pair.key.range : undefined;
    // measured before the merge replaces any of the nodes
    const valueEnd = block && pair ? contentEnd(pair.value) : undefined;
    const subtree = pair && isMap(pair.value) ? pair.value : new YAMLMap<unknown, unknown>();
    mergeChecksums(subtree, config);

    let text: string;
    if (block && pair && keyRange) {
      const start = keyRange[0];
      let end = valueEnd ?? keyRange[2];
      while (end > start && /\s/.test(this.#source[end - 1])) {
        end--;
      }
      const rest = this.#source.substring(end);
      text = this.#source.substring(0, start) + renderChecksums(subtree, eol) + (rest || eol);
    } else if (!pair && (block || Coerce.IsNull(root))) {
      const prefix = this.#source.length && !this.#source.endsWith('\n') ? `${this.#source}${eol}` : this.#source;
      text = `${prefix}${renderChecksums(subtree, eol)}${eol}`;
    } else if (isMap(root)) {
      // flow style: go through the document model instead
      this.#document.set('checksums', subtree);
      text = this.#document.toString().replace(/\r?\n/g, eol);
    } else {
      throw new ConfigurationError(i`${this.filename} is not a map; unable to write checksums into it`);
    }

    this.#source = text;
    this.#lineCounter = new LineCounter();
    this.#document = parseDocument(text, { prettyErrors: false, lineCounter: this.#lineCounter, strict: true });
    this.#read = undefined;
  }

  toString(): string {
    return this.#source;
  }

  async save(filename = this.filename): Promise<void> {
    await writeFile(filename, this.#source, 'utf8');
  }
}
