import path from 'path';
import type { Element, RootContent } from 'hast';
import { common, createLowlight } from 'lowlight';
import { StyledSpan } from './types.js';

export const SYNTAX_STYLES = ['default', 'monochrome', 'none'] as const;

export type SyntaxStyle = (typeof SYNTAX_STYLES)[number];

type TokenStyle = Omit<StyledSpan, 'text'>;

// Keyed by highlight.js scope, without the `hljs-` prefix
const THEMES: Record<Exclude<SyntaxStyle, 'none'>, Record<string, TokenStyle>> = {
  default: {
    keyword: { color: '008000', bold: true },
    literal: { color: '008000', bold: true },
    built_in: { color: '008000' },
    type: { color: 'B00040' },
    number: { color: '666666' },
    string: { color: 'BA2121' },
    regexp: { color: 'A45A77' },
    comment: { color: '3D7B7B', italic: true },
    doctag: { color: 'BA2121', italic: true },
    meta: { color: '9C6500' },
    title: { color: '0000FF' },
    section: { color: '000080', bold: true },
    tag: { color: '008000', bold: true },
    name: { color: '008000', bold: true },
    attr: { color: '687822' },
    attribute: { color: '687822' },
    property: { color: '687822' },
    variable: { color: '19177C' },
    symbol: { color: '19177C' },
    'selector-tag': { color: '008000', bold: true },
    'selector-class': { color: '0000FF' },
    'selector-id': { color: '0000FF' },
    emphasis: { italic: true },
    strong: { bold: true }
  },
  monochrome: {
    keyword: { bold: true },
    literal: { bold: true },
    built_in: { bold: true },
    type: { bold: true },
    title: { bold: true },
    section: { bold: true },
    tag: { bold: true },
    name: { bold: true },
    'selector-tag': { bold: true },
    comment: { italic: true },
    doctag: { italic: true },
    string: { italic: true },
    emphasis: { italic: true },
    strong: { bold: true }
  }
};

export const isStyled = (span: StyledSpan) => Boolean(span.color || span.bold || span.italic);

/**
 * Splits a line of source into styled runs using highlight.js grammars.
 * Lines are highlighted one at a time, so constructs spanning several lines
 * (block comments, template strings) are only recognized on their opening line.
 */
export class SyntaxHighlighter {
  private lowlight = createLowlight(common);
  private theme?: Record<string, TokenStyle>;

  constructor(style: SyntaxStyle) {
    this.theme = style === 'none' ? undefined : THEMES[style];
  }

  /** Grammar name for a file, resolved from its extension; undefined when none applies. */
  languageFor(filePath: string): string | undefined {
    if (!this.theme) return undefined;
    const ext = path.extname(filePath).slice(1).toLowerCase();
    return ext && this.lowlight.registered(ext) ? ext : undefined;
  }

  highlight(text: string, language: string): StyledSpan[] {
    const theme = this.theme;
    if (!theme) return [{ text }];

    const spans: StyledSpan[] = [];
    const visit = (nodes: readonly RootContent[], style: TokenStyle) => {
      for (const node of nodes) {
        if (node.type === 'text') {
          spans.push({ text: node.value, ...style });
        } else if (node.type === 'element') {
          const scope = scopeOf(node);
          visit(node.children, (scope && theme[scope]) || style);
        }
      }
    };
    visit(this.lowlight.highlight(language, text).children, {});
    return merge(spans);
  }
}

function scopeOf(node: Element): string | undefined {
  const names = node.properties.className;
  if (!Array.isArray(names)) return undefined;
  const scope = names.map(String).find((name) => name.startsWith('hljs-'));
  return scope?.slice('hljs-'.length);
}

/** Joins neighbouring runs that share a style. */
function merge(spans: StyledSpan[]): StyledSpan[] {
  const out: StyledSpan[] = [];
  for (const span of spans) {
    const last = out[out.length - 1];
    if (last && last.color === span.color && last.bold === span.bold && last.italic === span.italic) {
      last.text += span.text;
    } else {
      out.push({ ...span });
    }
  }
  return out;
}
