/**
 * XML ↔ xast utilities for Akoma Ntoso trees.
 * - Normalizes input (BOM, XML declaration, DOCTYPE; bytes decoded with their announced encoding)
 * - Namespace-agnostic element access by *local name*
 * - Small mutation surface: set attributes, insert siblings, remove children
 *
 * Public surface:
 *   - normalizeInput(xml), sniffEncoding(bytes), parseXmlToXast(xml)
 *   - getRootElement, localName, prefixOf, getAttr, setAttr
 *   - childElements, firstChild, findDescendant, findParent, insertAfter, insertFirst, removeChild
 *   - collectNamespaceDeclarations, prefixFor, indentElement
 */

import { fromXml } from "xast-util-from-xml";
import type { Element as XEl, ElementContent, Root, RootContent } from "xast";
import { ValidationError } from "../../shared/errors.ts";

/* ────────────────────────────── Types ────────────────────────────── */

/** Raw markup: text, or bytes carrying an optional encoding declaration. */
export type XmlInput = string | Uint8Array;

/** An element or the document root; both can hold element children. */
export type XParent = XEl | Root;

/** How far into the document we look for `encoding="..."`. */
const ENCODING_SCAN_LIMIT = 200;
const ENCODING_RE = /encoding=["']([\w.:-]+)["']/;

/* ────────────────────── Names ────────────────────── */

export function localName(qname: string): string {
  const i = qname.indexOf(":");
  return i >= 0 ? qname.slice(i + 1) : qname;
}

export function prefixOf(qname: string): string {
  const i = qname.indexOf(":");
  return i >= 0 ? qname.slice(0, i) : "";
}

/* ────────────────────── Prolog & encoding ────────────────────── */

function stripProlog(input: string): string {
  let i = 0;
  if (input.charCodeAt(0) === 0xFEFF) i = 1; // BOM
  let s = input.slice(i);

  while (true) {
    let advanced = false;

    // leading whitespace
    let j = 0;
    while (j < s.length && /\s/.test(s[j] ?? "")) j++;
    if (j) {
      s = s.slice(j);
      advanced = true;
    }

    // <?xml ...?>
    if (s.startsWith("<?xml")) {
      const end = s.indexOf("?>");
      if (end >= 0) {
        s = s.slice(end + 2);
        advanced = true;
        continue;
      }
    }

    // <!DOCTYPE ... [ ... ]>
    if (s.startsWith("<!DOCTYPE")) {
      const gt = s.indexOf(">");
      const br = s.indexOf("[");
      if (gt >= 0 && (br < 0 || br > gt)) {
        s = s.slice(gt + 1);
        advanced = true;
        continue;
      }
      if (br >= 0) {
        const endSubset = s.indexOf("]>");
        if (endSubset >= 0) {
          s = s.slice(endSubset + 2);
          advanced = true;
          continue;
        }
      }
    }

    if (!advanced) break;
  }
  return s;
}

/** The encoding named by a declaration near the start of the document, if any. */
export function declaredEncoding(head: string): string | undefined {
  return ENCODING_RE.exec(head.slice(0, ENCODING_SCAN_LIMIT))?.[1];
}

/**
 * The encoding announced by a byte order mark, or by the way `<` is laid out
 * in the first two bytes when UTF-16 text carries no mark.
 */
export function sniffEncoding(bytes: Uint8Array): string | undefined {
  const [b0, b1, b2] = bytes;
  if (b0 === 0xef && b1 === 0xbb && b2 === 0xbf) return "utf-8";
  if (b0 === 0xff && b1 === 0xfe) return "utf-16le";
  if (b0 === 0xfe && b1 === 0xff) return "utf-16be";
  if (b0 === 0x3c && b1 === 0x00) return "utf-16le";
  if (b0 === 0x00 && b1 === 0x3c) return "utf-16be";
  return undefined;
}

function decoderFor(label: string): TextDecoder {
  try {
    return new TextDecoder(label);
  } catch (err) {
    if (err instanceof RangeError) {
      throw new ValidationError(`Unsupported XML encoding: ${label}`, { actual: label });
    }
    throw err;
  }
}

/**
 * Turn raw input into text the parser accepts: bytes are decoded with the
 * encoding their byte order mark or declaration names (utf-8 otherwise), and
 * the prolog, whose encoding no longer applies to decoded text, is dropped.
 */
export function normalizeInput(xml: XmlInput): string {
  if (typeof xml === "string") return stripProlog(xml);

  // Declarations are ASCII, so a latin1 view of the head is enough to sniff one.
  const label =
    sniffEncoding(xml) ??
    declaredEncoding(new TextDecoder("latin1").decode(xml.subarray(0, ENCODING_SCAN_LIMIT))) ??
    "utf-8";
  return stripProlog(decoderFor(label).decode(xml));
}

/* ───────────────────────── Parse & helpers ───────────────────────── */

/** Parse markup into xast. Malformed markup fails with the parser's own error. */
export function parseXmlToXast(xml: XmlInput): Root {
  return fromXml(normalizeInput(xml));
}

export function getRootElement(ast: Root): XEl {
  const el = ast.children.find((n): n is XEl => n.type === "element");
  if (!el) throw new Error("XML has no root element");
  return el;
}

export function getAttr(el: XEl, name: string): string | undefined {
  return el.attributes[name] ?? undefined;
}

export function setAttr(el: XEl, name: string, value: string): void {
  el.attributes[name] = value;
}

export function childElements(el: XParent, name?: string): XEl[] {
  const children: RootContent[] = el.children;
  return children
    .filter((c): c is XEl => c.type === "element")
    .filter((c) => (name ? localName(c.name) === name : true));
}

export function firstChild(el: XParent, name: string): XEl | undefined {
  return childElements(el, name)[0];
}

/** Depth-first, pre-order search below `el` (excluding `el` itself). */
export function findDescendant(el: XParent, test: (node: XEl) => boolean): XEl | undefined {
  for (const child of childElements(el)) {
    if (test(child)) return child;
    const hit = findDescendant(child, test);
    if (hit) return hit;
  }
  return undefined;
}

/** xast has no parent links, so walk down from `from` until `target` is found. */
export function findParent(from: XParent, target: XEl): XParent | undefined {
  for (const child of childElements(from)) {
    if (child === target) return from;
    const hit = findParent(child, target);
    if (hit) return hit;
  }
  return undefined;
}

/** Insert `node` as the sibling immediately following `after`. */
export function insertAfter(scope: XParent, after: XEl, node: XEl): void {
  const parent = findParent(scope, after);
  if (!parent) throw new Error(`<${after.name}> is not attached to this document`);
  const i = parent.children.indexOf(after);
  parent.children.splice(i + 1, 0, node);
}

export function insertFirst(parent: XEl, node: XEl): void {
  parent.children.unshift(node);
}

/** Remove `child` from `parent`; returns false when it was not a child. */
export function removeChild(parent: XEl, child: XEl): boolean {
  const i = parent.children.indexOf(child);
  if (i < 0) return false;
  parent.children.splice(i, 1);
  return true;
}

/* ───────────────────────── Namespaces ───────────────────────── */

function isNamespaceDeclaration(attr: string): boolean {
  return attr === "xmlns" || attr.startsWith("xmlns:");
}

/** Every namespace URI declared anywhere in the tree, in document order, without duplicates. */
export function collectNamespaceDeclarations(el: XEl): string[] {
  const seen = new Set<string>();
  const visit = (node: XEl) => {
    for (const [k, v] of Object.entries(node.attributes)) {
      if (isNamespaceDeclaration(k) && v) seen.add(v);
    }
    childElements(node).forEach(visit);
  };
  visit(el);
  return [...seen];
}

/**
 * The prefix bound to `namespace` on `el` ("" for the default namespace).
 * Falls back to the prefix `el` itself is written with.
 */
export function prefixFor(el: XEl, namespace: string): string {
  for (const [k, v] of Object.entries(el.attributes)) {
    if (v !== namespace) continue;
    if (k === "xmlns") return "";
    if (k.startsWith("xmlns:")) return k.slice("xmlns:".length);
  }
  return prefixOf(el.name);
}

/* ───────────────────────── Pretty printing ───────────────────────── */

function isBlank(node: ElementContent): boolean {
  return node.type === "text" && node.value.trim() === "";
}

function applyIndent(el: XEl, depth: number, indent: string): void {
  // Mixed content keeps its text exactly as written.
  if (!el.children.every((c) => c.type === "element" || c.type === "comment" || isBlank(c))) return;
  const kept = el.children.filter((c) => !isBlank(c));
  if (kept.length === 0) return;

  const next: ElementContent[] = [];
  for (const c of kept) {
    next.push({ type: "text", value: "\n" + indent.repeat(depth + 1) }, c);
    if (c.type === "element") applyIndent(c, depth + 1, indent);
  }
  next.push({ type: "text", value: "\n" + indent.repeat(depth) });
  el.children = next;
}

/** A copy of `el` with element-only content indented; `el` is left untouched. */
export function indentElement(el: XEl, indent = "  "): XEl {
  const copy = structuredClone(el);
  applyIndent(copy, 0, indent);
  return copy;
}
