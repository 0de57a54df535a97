/**
 * Content block extraction from a sarga listing page
 *
 * Each verse is a '.views-row' holding three fields: the verse body, the
 * word-by-word gloss and the English explanation.
 */

import { JSDOM } from "jsdom";
import type { BlockSection, ContentBlock } from "./types.js";

const ROW_SELECTOR = ".views-row";

/** Field selectors within a row, by section */
export const SECTION_SELECTORS: Record<BlockSection, string> = {
  body: ".views-field-body .field-content",
  gloss: ".views-field-field-htetrans .field-content",
  explanation: ".views-field-field-explanation .field-content",
};

// Text inside these elements is never page content
const SKIPPED_ELEMENTS = new Set(["SCRIPT", "STYLE", "NOSCRIPT"]);

/**
 * Collect the trimmed, non-empty text of every text node below an element,
 * in document order.
 */
export function collectTextNodes(root: Node): string[] {
  const parts: string[] = [];

  const visit = (node: Node) => {
    if (node.nodeType === node.TEXT_NODE) {
      const text = node.textContent?.trim() ?? "";
      if (text) parts.push(text);
      return;
    }
    if (node.nodeType === node.ELEMENT_NODE && SKIPPED_ELEMENTS.has(node.nodeName)) {
      return;
    }
    node.childNodes.forEach(visit);
  };

  visit(root);
  return parts;
}

/**
 * Get the lines of an element's text: one entry per text node, further split
 * on embedded newlines, trimmed, blank lines dropped.
 */
export function getTextLines(element: Element): string[] {
  return collectTextNodes(element)
    .flatMap((text) => text.split("\n"))
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Get an element's text as one line: text nodes joined by a single space.
 */
export function getInlineText(element: Element): string {
  return collectTextNodes(element).join(" ");
}

/**
 * Convert one '.views-row' element into a content block.
 */
export function extractContentBlock(row: Element): ContentBlock {
  const body = row.querySelector(SECTION_SELECTORS.body);
  const gloss = row.querySelector(SECTION_SELECTORS.gloss);
  const explanation = row.querySelector(SECTION_SELECTORS.explanation);

  return {
    bodyLines: body ? getTextLines(body) : null,
    glossText: gloss ? getInlineText(gloss) : null,
    explanationText: explanation ? getInlineText(explanation) : null,
  };
}

/**
 * Extract every verse block of a page, in document order.
 *
 * @param html - Raw page HTML
 * @returns Content blocks; empty when the page has no verse rows
 */
export function extractContentBlocks(html: string): ContentBlock[] {
  const { window } = new JSDOM(html);
  try {
    return Array.from(window.document.querySelectorAll(ROW_SELECTOR), extractContentBlock);
  } finally {
    window.close();
  }
}
