/**
 * HTML Text-Node Codec
 *
 * Splits an HTML fragment into its translatable text runs and writes
 * translated runs back without touching tags or attributes.
 */

import * as cheerio from 'cheerio';
import { AnyNode, hasChildren, isTag, isText, Text } from 'domhandler';
import { HtmlStructure } from '../entities/FieldMapping';
import { isRtlLanguage } from '../entities/Language';

export interface TextNode {
    /** Trimmed text of the run. */
    text: string;
    /** Enclosing element, null for top-level text. */
    parentTag: string | null;
    parentAttributes: Record<string, string>;
}

const SKIPPED_ELEMENTS = new Set(['script', 'style']);

function loadFragment(html: string): cheerio.CheerioAPI {
    return cheerio.load(html, null, false);
}

function collectTextNodes(nodes: AnyNode[], out: Text[]): void {
    for (const node of nodes) {
        if (isText(node)) {
            out.push(node);
        } else if (isTag(node) && SKIPPED_ELEMENTS.has(node.name)) {
            continue;
        } else if (hasChildren(node)) {
            collectTextNodes(node.children, out);
        }
    }
}

function textNodesOf($: cheerio.CheerioAPI): Text[] {
    const nodes: Text[] = [];
    collectTextNodes($.root().contents().toArray(), nodes);
    return nodes;
}

/**
 * Text runs in document order. Whitespace-only runs and the contents of
 * script/style elements are skipped.
 */
export function decode(html: string): TextNode[] {
    const $ = loadFragment(html);
    const result: TextNode[] = [];

    for (const node of textNodesOf($)) {
        const text = node.data.trim();
        if (!text) continue;

        const parent = node.parent;
        result.push({
            text,
            parentTag: parent && isTag(parent) ? parent.name : null,
            parentAttributes: parent && isTag(parent) ? { ...parent.attribs } : {}
        });
    }

    return result;
}

/**
 * Replaces every run whose trimmed text is a key of `translations`,
 * keeping the run's surrounding whitespace.
 */
export function encode(html: string, translations: ReadonlyMap<string, string>): string {
    const $ = loadFragment(html);

    for (const node of textNodesOf($)) {
        const text = node.data.trim();
        if (!text) continue;

        const translated = translations.get(text);
        if (translated === undefined) continue;

        const leading = /^\s*/.exec(node.data)?.[0] ?? '';
        const trailing = /\s*$/.exec(node.data)?.[0] ?? '';
        node.data = `${leading}${translated}${trailing}`;
    }

    return $.html();
}

/**
 * Tags in document order, classes, and non-class attribute names per tag.
 */
export function describeStructure(html: string): HtmlStructure {
    const $ = loadFragment(html);
    const structure: HtmlStructure = { tags: [], classes: [], attributes: {} };

    for (const element of $('*').toArray().filter(isTag)) {
        structure.tags.push(element.name);

        const classAttr = element.attribs.class;
        if (classAttr) {
            structure.classes.push(...classAttr.split(/\s+/).filter(Boolean));
        }

        const attributeNames = Object.keys(element.attribs);
        if (attributeNames.length > 0) {
            structure.attributes[element.name] = attributeNames.filter(name => name !== 'class');
        }
    }

    return structure;
}

/**
 * Removes script and style elements.
 */
export function stripExecutableContent(html: string): string {
    const $ = loadFragment(html);
    $('script, style').remove();
    return $.html();
}

/**
 * Instruction sent along with a single text run.
 */
export function buildFragmentContext(text: string, targetLang: string): string {
    if (isRtlLanguage(targetLang)) {
        return `HTML fragment translation to ${targetLang}. Translate ONLY this exact text segment: '${text}'. `
            + `Use natural ${targetLang} word order and sentence flow that reads naturally from right to left. `
            + 'Do not add any additional words, explanations, or content.';
    }
    return `HTML fragment translation. Translate ONLY this exact text segment: '${text}'. `
        + 'Do not add any additional words, explanations, or content. Preserve the exact meaning and length.';
}

/**
 * Cheap check for an HTML tag anywhere in the value.
 */
export function isHtml(value: string): boolean {
    return /<[^>]+>/.test(value);
}
