/**
 * Layout parser: indentation-structured layout text → forest of root nodes
 */

import { readFileSync } from 'fs';
import { isAbsolute, resolve, sep } from 'path';
import { isCheckoutName, isRemoteUrl, repositoryName } from '../sync/remote-url.js';
import {
  InvalidEntryError,
  MalformedIndentationError,
  OverlappingRootsError,
} from '../../shared/errors.js';
import type {
  ContainerChild,
  LayoutForest,
  LayoutNode,
  ParseOptions,
  RootNode,
} from '../../shared/types.js';

interface Frame {
  depth: number;
  node: LayoutNode;
}

interface IndentUnit {
  char: string | null;
  width: number;
}

const LEADING_WHITESPACE_REGEX = /^[ \t]*/;
// Widest unit taken from a file without INDENT_WIDTH; deeper first lines count as several levels
const MAX_DETECTED_SPACES = 4;

export class LayoutParser {
  /**
   * Parse layout text. Throws a LayoutParseError subclass on the first
   * structural problem; nothing is returned for a partially valid layout.
   */
  static parse(text: string, options: ParseOptions = {}): LayoutForest {
    const roots: RootNode[] = [];
    const stack: Frame[] = [];
    let unit: IndentUnit | null = options.indentWidth && options.indentWidth > 0
      ? { char: null, width: options.indentWidth }
      : null;

    const lines = text.split(/\r?\n/);
    for (let index = 0; index < lines.length; index++) {
      const raw = lines[index];
      const line = index + 1;
      const content = raw.trim();
      if (!content) continue;

      const leading = LEADING_WHITESPACE_REGEX.exec(raw)?.[0] ?? '';
      if (leading.length > 0 && unit === null) {
        unit = { char: null, width: detectWidth(leading) };
      }
      const depth = LayoutParser.measureDepth(leading, unit, line, raw);
      if (unit && unit.char === null && leading.length > 0) {
        unit.char = leading[0];
      }

      // Close every scope at the same depth or deeper
      while (stack.length > 0 && stack[stack.length - 1].depth >= depth) {
        stack.pop();
      }
      const parent: Frame | undefined = stack[stack.length - 1];

      if (!parent) {
        const root = LayoutParser.createRoot(content, depth, line, raw, roots);
        roots.push(root);
        stack.push({ depth, node: root });
        continue;
      }

      if (depth > parent.depth + 1) {
        throw new MalformedIndentationError(
          `indented ${depth - parent.depth} levels below the enclosing entry on line ${parent.node.line}`,
          line,
          raw
        );
      }
      if (parent.node.kind === 'repository') {
        throw new MalformedIndentationError(
          `repository on line ${parent.node.line} cannot contain nested entries`,
          line,
          raw
        );
      }

      const child = LayoutParser.createChild(content, line, raw);
      parent.node.children.push(child);
      stack.push({ depth, node: child });
    }

    return roots;
  }

  static readFile(filePath: string, options: ParseOptions = {}): LayoutForest {
    return LayoutParser.parse(readFileSync(filePath, 'utf-8'), options);
  }

  private static measureDepth(
    leading: string,
    unit: IndentUnit | null,
    line: number,
    raw: string
  ): number {
    if (leading.length === 0 || unit === null) return 0;

    if (leading.includes(' ') && leading.includes('\t')) {
      throw new MalformedIndentationError('indentation mixes tabs and spaces', line, raw);
    }
    if (unit.char !== null && leading[0] !== unit.char) {
      throw new MalformedIndentationError(
        `indentation uses ${describeChar(leading[0])} but the file is indented with ${describeChar(unit.char)}`,
        line,
        raw
      );
    }
    if (leading.length % unit.width !== 0) {
      throw new MalformedIndentationError(
        `indentation of ${leading.length} is not a multiple of ${unit.width}`,
        line,
        raw
      );
    }
    return leading.length / unit.width;
  }

  private static createRoot(
    content: string,
    depth: number,
    line: number,
    raw: string,
    previousRoots: RootNode[]
  ): RootNode {
    if (depth > 0) {
      throw new MalformedIndentationError('indented entry has no enclosing entry', line, raw);
    }
    if (isRemoteUrl(content)) {
      throw new InvalidEntryError('repository URL must be nested under a directory', line, raw);
    }
    if (!isAbsolute(content)) {
      throw new InvalidEntryError('top-level entry must be an absolute path', line, raw);
    }

    const normalized = resolve(content);
    for (const previous of previousRoots) {
      const other = resolve(previous.label);
      if (normalized === other) {
        throw new OverlappingRootsError(`duplicates the root on line ${previous.line}`, line, raw);
      }
      if (isInside(normalized, other) || isInside(other, normalized)) {
        throw new OverlappingRootsError(`overlaps the root on line ${previous.line}`, line, raw);
      }
    }

    return { kind: 'root', label: content, line, children: [] };
  }

  private static createChild(content: string, line: number, raw: string): ContainerChild {
    if (isRemoteUrl(content)) {
      if (!isCheckoutName(repositoryName(content))) {
        throw new InvalidEntryError('repository URL does not name a checkout directory', line, raw);
      }
      return { kind: 'repository', label: content, line };
    }
    if (isAbsolute(content)) {
      throw new InvalidEntryError('absolute path is only allowed at the top level', line, raw);
    }
    if (content.includes('/') || content.includes('\\') || content === '.' || content === '..') {
      throw new InvalidEntryError('nested path must be a single directory name', line, raw);
    }
    return { kind: 'directory', label: content, line, children: [] };
  }
}

function isInside(child: string, ancestor: string): boolean {
  const prefix = ancestor.endsWith(sep) ? ancestor : ancestor + sep;
  return child.startsWith(prefix);
}

function detectWidth(leading: string): number {
  return leading[0] === '\t' ? 1 : Math.min(leading.length, MAX_DETECTED_SPACES);
}

function describeChar(char: string): string {
  return char === '\t' ? 'tabs' : 'spaces';
}
