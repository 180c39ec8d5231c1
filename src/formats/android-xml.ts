import render from 'dom-serializer';
import { type ChildNode, Comment, Element, isCDATA, isComment, isTag, isText, Text } from 'domhandler';
import { XMLValidator } from 'fast-xml-parser';
import { parseDocument } from 'htmlparser2';

import { InvalidEscapeError, InvalidResourceError } from '../errors.js';
import { Logger, SilentLogger } from '../logger.js';
import { isPluralKeyword, type PluralKeyword, sortPluralKeywords } from '../plurals/index.js';
import { decodeAndroidText, encodeAndroidText, trimAndroidWhitespace } from './android-text.js';
import { Resource, ResourceTree } from './index.js';

export const XLIFF_NAMESPACE = 'urn:oasis:names:tc:xliff:document:1.2';

const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';

function escapeXmlText(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function escapeXmlAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/"/g, '&quot;');
}

function textContent(node: ChildNode): string {
  if (isText(node)) {
    return node.data;
  }
  if (isCDATA(node)) {
    return node.children.map(textContent).join('');
  }
  return '';
}

type NamespaceScope = Map<string, string>;

function extendScope(scope: NamespaceScope, attribs: Record<string, string>): NamespaceScope {
  const declarations = Object.entries(attribs).filter(([key]) => key.startsWith('xmlns:'));
  if (declarations.length === 0) {
    return scope;
  }
  const extended = new Map(scope);
  for (const [key, uri] of declarations) {
    extended.set(key.substring('xmlns:'.length), uri);
  }
  return extended;
}

/**
 * Renders a nested element as .po text. Elements in the xliff namespace always use the `xliff:` prefix; elements in
 * any other declared namespace carry their `xmlns:` declaration along, since the .po file has no other place for it.
 */
function renderStartTag(element: Element, scope: NamespaceScope): { open: string; close: string } {
  let name = element.name;
  let attributes = Object.entries(element.attribs);

  const separator = name.indexOf(':');
  if (separator > 0) {
    const prefix = name.substring(0, separator);
    const uri = scope.get(prefix);
    if (uri === XLIFF_NAMESPACE) {
      name = `xliff:${name.substring(separator + 1)}`;
      attributes = attributes.filter(([key]) => key !== `xmlns:${prefix}`);
    } else if (uri !== undefined && element.attribs[`xmlns:${prefix}`] === undefined) {
      attributes = [[`xmlns:${prefix}`, uri], ...attributes];
    }
  }

  const renderedAttributes = attributes.map(([key, value]) => ` ${key}="${escapeXmlAttribute(value)}"`).join('');
  return { open: `<${name}${renderedAttributes}>`, close: `</${name}>` };
}

interface ReadContext {
  name: string;
  logger: Logger;
}

function renderMixedContent(nodes: ChildNode[], scope: NamespaceScope, context: ReadContext): string {
  let result = '';
  for (const node of nodes) {
    if (isText(node) || isCDATA(node)) {
      result += decodeAndroidText(textContent(node), context);
    } else if (isTag(node)) {
      const innerScope = extendScope(scope, node.attribs);
      const { open, close } = renderStartTag(node, innerScope);
      result += open + renderMixedContent(node.children, innerScope, context) + close;
    }
  }
  return result;
}

/**
 * Reads the value of a `<string>` or `<item>` element. Returns undefined when the value has to be skipped:
 * resource references and malformed escapes.
 */
function readValue(element: Element, scope: NamespaceScope, context: ReadContext): string | undefined {
  try {
    if (element.children.some(isTag)) {
      return renderMixedContent(element.children, extendScope(scope, element.attribs), context);
    }

    const raw = element.children.map(textContent).join('');
    const trimmed = trimAndroidWhitespace(raw);
    if (trimmed.startsWith('@')) {
      context.logger.warn(`Ignoring "${context.name}": it is a resource reference (${trimmed})`);
      return undefined;
    }
    return decodeAndroidText(raw, { ...context, trim: true });
  } catch (error) {
    if (error instanceof InvalidEscapeError) {
      context.logger.warn(`Ignoring "${context.name}": ${error.message}`);
      return undefined;
    }
    throw error;
  }
}

function childElements(element: Element, name: string): Element[] {
  return element.children.filter((child): child is Element => isTag(child) && child.name === name);
}

function readResource(element: Element, scope: NamespaceScope, logger: Logger): Resource | undefined {
  const name = element.attribs['name'];

  switch (element.name) {
    case 'string': {
      const text = readValue(element, scope, { name, logger });
      if (!text) {
        if (text === '') {
          logger.debug(`Skipping empty string "${name}"`);
        }
        return undefined;
      }
      return { kind: 'string', name, text };
    }

    case 'string-array': {
      const items = childElements(element, 'item').map((item, index) => {
        const text = readValue(item, scope, { name: `${name}:${index}`, logger });
        return text === '' ? undefined : text;
      });
      return { kind: 'string-array', name, items };
    }

    case 'plurals': {
      const forms = new Map<PluralKeyword, string>();
      for (const item of childElements(element, 'item')) {
        const quantity = item.attribs['quantity'] ?? '';
        if (!isPluralKeyword(quantity)) {
          logger.warn(`Plural "${name}" uses unknown quantity "${quantity}"; ignoring it`);
          continue;
        }
        if (forms.has(quantity)) {
          logger.warn(`Plural "${name}" defines quantity "${quantity}" twice; ignoring the second one`);
          continue;
        }
        // One unreadable quantity makes the whole plural unusable.
        const text = readValue(item, scope, { name, logger });
        if (text === undefined) {
          return undefined;
        }
        forms.set(quantity, text);
      }
      return { kind: 'plurals', name, forms };
    }

    default:
      return undefined;
  }
}

/**
 * Parses the contents of an Android strings.xml file.
 *
 * @throws InvalidResourceError when the document is not well-formed XML
 */
export function readResources(xml: string, logger: Logger = new SilentLogger()): ResourceTree {
  const content = xml.replace(/^\uFEFF/, '').trimStart();

  const validation = XMLValidator.validate(content);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new InvalidResourceError(`${msg} (line ${line}, column ${col})`);
  }

  const document = parseDocument(content, { xmlMode: true });
  const resources = document.children.find(
    (node): node is Element => isTag(node) && node.name === 'resources'
  );
  if (!resources) {
    throw new InvalidResourceError('missing <resources> root element');
  }

  const scope = extendScope(new Map(), resources.attribs);
  const tree: ResourceTree = new Map();
  let pendingComment: string | undefined;

  for (const node of resources.children) {
    if (isComment(node)) {
      pendingComment = node.data.trim();
      continue;
    }
    if (!isTag(node)) {
      if (textContent(node).trim() !== '') {
        pendingComment = undefined;
      }
      continue;
    }

    const comment = pendingComment;
    pendingComment = undefined;

    const name = node.attribs['name'];
    if (!name) {
      logger.debug(`Skipping <${node.name}> without a name`);
      continue;
    }
    if (node.attribs['translatable'] === 'false') {
      logger.debug(`Skipping untranslatable resource "${name}"`);
      continue;
    }
    if (tree.has(name)) {
      logger.warn(`Duplicate resource id found: ${name}, ignoring.`);
      continue;
    }

    const resource = readResource(node, scope, logger);
    if (resource) {
      tree.set(name, comment ? { ...resource, comment } : resource);
    }
  }

  return tree;
}

function convertValueNodes(nodes: ChildNode[], topLevel: boolean): ChildNode[] {
  const converted: ChildNode[] = [];
  nodes.forEach((node, index) => {
    if (isText(node) || isCDATA(node)) {
      const edges = { start: topLevel && index === 0, end: topLevel && index === nodes.length - 1 };
      converted.push(new Text(escapeXmlText(encodeAndroidText(textContent(node), edges))));
    } else if (isTag(node)) {
      const attribs: Record<string, string> = {};
      for (const [key, value] of Object.entries(node.attribs)) {
        attribs[key] = escapeXmlAttribute(value);
      }
      converted.push(new Element(node.name, attribs, convertValueNodes(node.children, false)));
    }
  });
  return converted;
}

/**
 * Builds the XML content for a message text. Literal `&lt;` / `&gt;` stay encoded, anything else that looks like a
 * tag becomes an element. Text that is not well-formed is reported and parsed by the forgiving parser, which closes
 * tags left open.
 */
function buildValue(value: string, name: string, logger: Logger): ChildNode[] {
  const prepared = value.replace(/&/g, '&amp;').replace(/&amp;(lt|gt);/g, '&$1;');
  const wrapped = `<value>${prepared}</value>`;

  const validation = XMLValidator.validate(wrapped);
  if (validation !== true) {
    logger.warn(`Message "${name}" contains invalid XHTML (${validation.err.msg}); falling back to the loose parser`);
  }

  const document = parseDocument(wrapped, { xmlMode: true });
  const wrapper = document.children.find(isTag);
  return wrapper ? convertValueNodes(wrapper.children, true) : [];
}

function usesXliff(nodes: ChildNode[]): boolean {
  return nodes.some((node) => isTag(node) && (node.name.startsWith('xliff:') || usesXliff(node.children)));
}

function indented(nodes: ChildNode[], indent: string): ChildNode[] {
  if (nodes.length === 0) {
    return [];
  }
  return [...nodes.flatMap((node) => [new Text(`\n${indent}    `), node]), new Text(`\n${indent}`)];
}

function buildResource(resource: Resource, logger: Logger): Element {
  switch (resource.kind) {
    case 'string':
      return new Element(
        'string',
        { name: escapeXmlAttribute(resource.name) },
        buildValue(resource.text, resource.name, logger)
      );

    case 'string-array': {
      const items = resource.items.map(
        (item, index) =>
          new Element('item', {}, item === undefined ? [] : buildValue(item, `${resource.name}:${index}`, logger))
      );
      return new Element('string-array', { name: escapeXmlAttribute(resource.name) }, indented(items, '    '));
    }

    case 'plurals': {
      const items = sortPluralKeywords(resource.forms.keys()).map((quantity) => {
        const text = resource.forms.get(quantity) ?? '';
        return new Element('item', { quantity }, buildValue(text, `${resource.name}[${quantity}]`, logger));
      });
      return new Element('plurals', { name: escapeXmlAttribute(resource.name) }, indented(items, '    '));
    }
  }
}

/** Renders a resource tree as a strings.xml document. */
export function writeResources(tree: ResourceTree, logger: Logger = new SilentLogger()): string {
  const nodes: ChildNode[] = [];
  for (const resource of tree.values()) {
    if (resource.comment) {
      nodes.push(new Comment(` ${resource.comment.replace(/--/g, '- -')} `));
    }
    nodes.push(buildResource(resource, logger));
  }

  const attribs: Record<string, string> = {};
  if (usesXliff(nodes)) {
    attribs['xmlns:xliff'] = XLIFF_NAMESPACE;
  }

  const root = new Element('resources', attribs, indented(nodes, ''));
  const body = render(root, { xmlMode: true, encodeEntities: false, selfClosingTags: false });
  return `${XML_DECLARATION}\n${body}\n`;
}
