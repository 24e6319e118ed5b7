import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import { AstNode } from './types';
import { AstLoadError } from './errors';
import { createComponentLogger } from '../utils/logger';

const logger = createComponentLogger('ast-loader');

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) {
    return attributes;
  }
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      attributes[key] = String(value);
    }
  }
  return attributes;
}

function toAstNodes(raw: unknown): AstNode[] {
  if (!Array.isArray(raw)) {
    return [];
  }
  const items: unknown[] = raw;
  const nodes: AstNode[] = [];

  for (const item of items) {
    if (!isRecord(item)) continue;
    const tag = Object.keys(item).find(key => key !== ATTRIBUTES_KEY && key !== TEXT_KEY);
    if (!tag) continue;

    nodes.push({
      tag,
      attributes: readAttributes(item[ATTRIBUTES_KEY]),
      children: toAstNodes(item[tag]),
    });
  }

  return nodes;
}

/**
 * Parse an XML AST dump (e.g. `verilator --xml-only`) into an AstNode tree,
 * keeping child order and every attribute as a string.
 */
export function loadXmlAst(xml: string): AstNode {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { code, msg, line } = validation.err;
    throw new AstLoadError(`Invalid XML AST: ${msg}`, 'xml', [`${code} at line ${line}`]);
  }

  const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '',
    ignoreDeclaration: true,
    ignorePiTags: true,
    parseAttributeValue: false,
    parseTagValue: false,
  });

  const parsed: unknown = parser.parse(xml);
  const roots = toAstNodes(parsed);

  if (roots.length === 0) {
    throw new AstLoadError('XML AST contains no elements', 'xml');
  }

  logger.debug('Loaded XML AST', { root: roots[0].tag, topLevelElements: roots.length });
  return roots.length === 1 ? roots[0] : { tag: 'root', attributes: {}, children: roots };
}

interface JsonAstNode {
  tag: string;
  attributes?: Record<string, string>;
  children?: JsonAstNode[];
}

const jsonAstSchema: z.ZodType<JsonAstNode> = z.lazy(() =>
  z.object({
    tag: z.string().min(1),
    attributes: z.record(z.string()).optional(),
    children: z.array(jsonAstSchema).optional(),
  })
);

function fromJsonNode(node: JsonAstNode): AstNode {
  return {
    tag: node.tag,
    attributes: node.attributes ?? {},
    children: (node.children ?? []).map(fromJsonNode),
  };
}

/**
 * Validate a JSON AST (`{ tag, attributes?, children? }`, recursively).
 */
export function loadJsonAst(json: unknown): AstNode {
  const result = jsonAstSchema.safeParse(json);
  if (!result.success) {
    const details = result.error.issues.map(
      issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
    throw new AstLoadError('JSON AST failed validation', 'json', details);
  }
  return fromJsonNode(result.data);
}
