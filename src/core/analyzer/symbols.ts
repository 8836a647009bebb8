/**
 * Top-level symbol extraction and generator attribution.
 */
import type { Attribution, SymbolKind } from './types.js';

export interface ExtractedSymbol {
  name: string;
  kind: SymbolKind;
  line: number;
  confidence: number;
}

/** Marker every generated file carries in its first lines. */
export const GENERATED_MARKER = '@appforge';
const MARKER_PATTERN = /@appforge\s+generator=([a-z0-9][a-z0-9-]*)/;
const MARKER_SCAN_LINES = 5;

const SWIFT_DECLARATION =
  /^(?:@\w+(?:\([^)]*\))?\s+)*(?:(?:public|internal|private|fileprivate|open|final|indirect|nonisolated)\s+)*(class|struct|enum|protocol|actor|extension|typealias|func)\s+([A-Za-z_][A-Za-z0-9_]*)/;
const OBJC_DECLARATION = /^@(interface|protocol)\s+([A-Za-z_][A-Za-z0-9_]*)/;

/** Extensions name a type declared elsewhere. */
const EXTENSION_CONFIDENCE = 0.4;
const DECLARATION_CONFIDENCE = 0.9;

/**
 * Read the generator marker from the head of a file.
 */
export function detectAttribution(content: string): Attribution {
  const head = content.split('\n', MARKER_SCAN_LINES).join('\n');
  const match = MARKER_PATTERN.exec(head);
  return match ? { kind: 'generated', generatorId: match[1] } : { kind: 'foreign' };
}

/**
 * Declarations starting at column 0 outside block comments.
 */
export function extractSymbols(relativePath: string, content: string): ExtractedSymbol[] {
  const isSwift = relativePath.endsWith('.swift');
  const isObjC = /\.(h|m|mm)$/.test(relativePath);
  if (!isSwift && !isObjC) return [];

  const symbols: ExtractedSymbol[] = [];
  const lines = content.split('\n');
  let inBlockComment = false;

  lines.forEach((line, index) => {
    if (inBlockComment) {
      if (line.includes('*/')) inBlockComment = false;
      return;
    }
    if (line.startsWith('/*')) {
      inBlockComment = !line.includes('*/');
      return;
    }

    if (isSwift) {
      const match = SWIFT_DECLARATION.exec(line);
      if (!match) return;
      const kind = toSymbolKind(match[1]);
      if (!kind) return;
      symbols.push({
        name: match[2],
        kind,
        line: index + 1,
        confidence: kind === 'extension' ? EXTENSION_CONFIDENCE : DECLARATION_CONFIDENCE,
      });
      return;
    }

    const match = OBJC_DECLARATION.exec(line);
    if (match) {
      symbols.push({
        name: match[2],
        kind: match[1] === 'protocol' ? 'protocol' : 'interface',
        line: index + 1,
        confidence: DECLARATION_CONFIDENCE,
      });
    }
  });

  return symbols;
}

function toSymbolKind(keyword: string): SymbolKind | undefined {
  switch (keyword) {
    case 'class':
    case 'struct':
    case 'enum':
    case 'protocol':
    case 'actor':
    case 'extension':
    case 'typealias':
    case 'func':
      return keyword;
    default:
      return undefined;
  }
}
