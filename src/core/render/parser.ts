/**
 * Template parser.
 *
 * Tags are `{{name}}`, `{{name | filter}}`, `{{#if cond}}`, `{{#unless cond}}`,
 * `{{else}}`, `{{/if}}`, `{{/unless}}` and `{{! comment }}`. A block tag or
 * comment alone on its line removes that whole line from the output.
 */
import { parseCondition, type Condition } from './condition.js';
import { isFilterName, type FilterName } from './escape.js';
import { RenderError, ErrorCodes } from '../../utils/errors.js';

export type TemplateNode =
  | { type: 'text'; value: string }
  | { type: 'placeholder'; name: string; filter: FilterName; line: number }
  | { type: 'block'; negate: boolean; condition: Condition; body: TemplateNode[]; alternate: TemplateNode[]; line: number };

type TagKind = 'placeholder' | 'open' | 'else' | 'close' | 'comment';

interface Tag {
  kind: TagKind;
  body: string;
  line: number;
}

const TAG_PATTERN = /\{\{([\s\S]*?)\}\}/g;
const PLACEHOLDER = /^([A-Za-z_][A-Za-z0-9_]*)(?:\s*\|\s*([A-Za-z]+))?$/;

function classify(body: string): TagKind {
  if (body.startsWith('!')) return 'comment';
  if (body.startsWith('#')) return 'open';
  if (body.startsWith('/')) return 'close';
  if (body === 'else') return 'else';
  return 'placeholder';
}

function isStandaloneKind(kind: TagKind): boolean {
  return kind !== 'placeholder';
}

function lineTail(text: string): string {
  return text.slice(text.lastIndexOf('\n') + 1);
}

function lineHead(text: string): string {
  const newline = text.indexOf('\n');
  return newline === -1 ? text : text.slice(0, newline);
}

/**
 * Split into alternating text and tag pieces, then strip the surrounding
 * whitespace of standalone tags. Texts always has tags.length + 1 entries.
 */
function scan(source: string, templateName: string): { texts: string[]; tags: Tag[] } {
  const texts: string[] = [];
  const tags: Tag[] = [];
  let cursor = 0;
  let line = 1;

  for (const match of source.matchAll(TAG_PATTERN)) {
    const index = match.index ?? 0;
    const before = source.slice(cursor, index);
    line += before.split('\n').length - 1;
    texts.push(before);
    const body = match[1].trim();
    if (body.includes('{{')) {
      throw new RenderError(ErrorCodes.TEMPLATE_SYNTAX, `Nested '{{' in tag at ${templateName}:${line}`, {
        template: templateName,
        line,
      });
    }
    tags.push({ kind: classify(body), body, line });
    line += match[0].split('\n').length - 1;
    cursor = index + match[0].length;
  }
  const rest = source.slice(cursor);
  if (rest.includes('{{')) {
    throw new RenderError(ErrorCodes.TEMPLATE_SYNTAX, `Unclosed '{{' in ${templateName}`, { template: templateName });
  }
  texts.push(rest);

  const standalone = tags.map((tag, i) => {
    if (!isStandaloneKind(tag.kind)) return false;
    const before = texts[i];
    const after = texts[i + 1];
    const startsLine = /^[ \t]*$/.test(lineTail(before)) && (i === 0 || before.includes('\n'));
    const endsLine = /^[ \t]*\r?$/.test(lineHead(after)) && (i === tags.length - 1 || after.includes('\n'));
    return startsLine && endsLine;
  });

  standalone.forEach((isStandalone, i) => {
    if (!isStandalone) return;
    texts[i] = texts[i].replace(/[ \t]*$/, '');
    texts[i + 1] = texts[i + 1].replace(/^[ \t]*\r?\n?/, '');
  });

  return { texts, tags };
}

interface OpenBlock {
  keyword: 'if' | 'unless';
  node: Extract<TemplateNode, { type: 'block' }>;
  inAlternate: boolean;
}

/**
 * Parse a template into nodes.
 */
export function parseTemplate(source: string, templateName = 'template'): TemplateNode[] {
  const { texts, tags } = scan(source, templateName);
  const root: TemplateNode[] = [];
  const stack: OpenBlock[] = [];

  const syntax = (message: string, line: number): RenderError =>
    new RenderError(ErrorCodes.TEMPLATE_SYNTAX, `${message} at ${templateName}:${line}`, {
      template: templateName,
      line,
    });

  const current = (): TemplateNode[] => {
    const top = stack[stack.length - 1];
    if (!top) return root;
    return top.inAlternate ? top.node.alternate : top.node.body;
  };

  const pushText = (value: string): void => {
    if (value.length > 0) current().push({ type: 'text', value });
  };

  tags.forEach((tag, i) => {
    pushText(texts[i]);

    switch (tag.kind) {
      case 'comment':
        return;

      case 'placeholder': {
        const match = PLACEHOLDER.exec(tag.body);
        if (!match) throw syntax(`Invalid placeholder '{{${tag.body}}}'`, tag.line);
        const filter = match[2] ?? 'text';
        if (!isFilterName(filter)) {
          throw new RenderError(
            ErrorCodes.UNKNOWN_FILTER,
            `Unknown filter '${filter}' at ${templateName}:${tag.line}`,
            { template: templateName, line: tag.line, filter }
          );
        }
        current().push({ type: 'placeholder', name: match[1], filter, line: tag.line });
        return;
      }

      case 'open': {
        const opener = /^#(if|unless)\s+([\s\S]+)$/.exec(tag.body);
        if (!opener) throw syntax(`Unknown block '{{${tag.body}}}'`, tag.line);
        const keyword = opener[1] === 'if' ? 'if' : 'unless';
        let condition: Condition;
        try {
          condition = parseCondition(opener[2]);
        } catch (error) {
          if (error instanceof RenderError) throw syntax(error.message, tag.line);
          throw error;
        }
        const node: OpenBlock['node'] = {
          type: 'block',
          negate: keyword === 'unless',
          condition,
          body: [],
          alternate: [],
          line: tag.line,
        };
        current().push(node);
        stack.push({ keyword, node, inAlternate: false });
        return;
      }

      case 'else': {
        const top = stack[stack.length - 1];
        if (!top || top.inAlternate) throw syntax("Unexpected '{{else}}'", tag.line);
        top.inAlternate = true;
        return;
      }

      case 'close': {
        const keyword = tag.body.slice(1).trim();
        const top = stack.pop();
        if (!top) throw syntax(`Unexpected '{{${tag.body}}}'`, tag.line);
        if (top.keyword !== keyword) {
          throw syntax(`'{{${tag.body}}}' closes '{{#${top.keyword}}}' opened on line ${top.node.line}`, tag.line);
        }
        return;
      }
    }
  });

  pushText(texts[texts.length - 1]);

  const unclosed = stack[stack.length - 1];
  if (unclosed) {
    throw syntax(`Unclosed '{{#${unclosed.keyword}}}'`, unclosed.node.line);
  }
  return root;
}
