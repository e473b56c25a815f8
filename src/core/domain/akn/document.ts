// document.ts
// Base wrapper for all Akoma Ntoso documents: parse, root check, namespace
// detection, dotted-path element access and serialization.
import { Buffer } from "node:buffer";
import type { Element as XEl } from "xast";
import { toXml, type Options as XastToXmlOptions } from "xast-util-to-xml";
import { x } from "xastscript";
import {
  collectNamespaceDeclarations,
  firstChild,
  getRootElement,
  indentElement,
  insertAfter,
  localName,
  parseXmlToXast,
  prefixFor,
  type XmlInput,
} from "../parse/xast_xml.ts";
import { resolveNamespace } from "../parse/namespaces.ts";
import { ValidationError } from "../../shared/errors.ts";
import { resolveConfig, type DocumentConfig, type DocumentOptions, type Source } from "../../shared/config.ts";

export interface SerializeOptions extends XastToXmlOptions {
  /** Indent element-only content (mixed content is left alone) */
  pretty?: boolean;
  /** Prefix the output with an XML declaration */
  declaration?: boolean;
}

export type XmlEncoding = "utf-8" | "utf-16le" | "latin1" | "ascii";

const ENCODING_LABELS: Record<XmlEncoding, string> = {
  "utf-8": "UTF-8",
  "utf-16le": "UTF-16",
  latin1: "ISO-8859-1",
  ascii: "US-ASCII",
};

/** Characters outside what a single-byte encoding can represent. */
const UNENCODABLE: Partial<Record<XmlEncoding, RegExp>> = {
  latin1: /[^\u0000-\u00ff]/gu,
  ascii: /[^\u0000-\u007f]/gu,
};

const UTF16LE_BOM = Buffer.from([0xff, 0xfe]);

export class AkomaNtosoDocument {
  /** The local name every Akoma Ntoso root element carries. */
  protected readonly expectedRoot: string = "akomaNtoso";

  readonly root: XEl;
  readonly namespace: string;
  readonly config: DocumentConfig;

  /** Prefix new elements are written with ("" for the default namespace). */
  protected readonly prefix: string;

  constructor(xml: XmlInput, options: DocumentOptions = {}) {
    this.config = resolveConfig(options);
    this.root = this.parse(xml);
    this.namespace = resolveNamespace(collectNamespaceDeclarations(this.root));
    this.prefix = prefixFor(this.root, this.namespace);
  }

  /** The tool recorded as source of generated metadata: name, id, url. */
  get source(): Source {
    return this.config.source;
  }

  /** Parse XML and ensure it's Akoma Ntoso. Returns the root element. */
  parse(xml: XmlInput): XEl {
    const root = getRootElement(parseXmlToXast(xml));

    const name = localName(root.name);
    if (name !== this.expectedRoot) {
      throw new ValidationError(`XML root element must be ${this.expectedRoot}, but got ${name} instead`, {
        expected: this.expectedRoot,
        actual: name,
      });
    }
    return root;
  }

  toXml(options: SerializeOptions = {}): string {
    const { pretty, declaration, ...rest } = options;
    const tree = pretty ? indentElement(this.root) : this.root;
    const xml = toXml(tree, { closeEmptyElements: true, tightClose: true, ...rest });
    return declaration ? `<?xml version="1.0" encoding="UTF-8"?>\n${xml}` : xml;
  }

  /**
   * Serialize to bytes. Characters the encoding cannot hold are written as
   * numeric character references; utf-16le output starts with a byte order mark.
   */
  toXmlBytes(options: SerializeOptions & { encoding?: XmlEncoding } = {}): Uint8Array {
    const { encoding = "utf-8", declaration, ...rest } = options;
    let xml = this.toXml(rest);
    if (declaration) xml = `<?xml version="1.0" encoding="${ENCODING_LABELS[encoding]}"?>\n${xml}`;

    const unencodable = UNENCODABLE[encoding];
    if (unencodable) xml = xml.replace(unencodable, (ch) => `&#${ch.codePointAt(0) ?? 0};`);

    const bytes = Buffer.from(xml, encoding);
    return encoding === "utf-16le" ? Buffer.concat([UTF16LE_BOM, bytes]) : bytes;
  }

  /**
   * First segment of a dotted path. The base document resolves it against
   * the children of the root element; subclasses add named accessors.
   */
  protected resolveSegment(name: string): XEl | undefined {
    return firstChild(this.root, name);
  }

  /**
   * Lookup a dotted-path element, starting at `root` (or at this document if
   * not given). Returns undefined if any element along the path is missing.
   */
  getElement(path: string, root?: XEl): XEl | undefined {
    const [head, ...rest] = path.split(".");
    if (head === undefined) return undefined;

    let node = root ? firstChild(root, head) : this.resolveSegment(head);
    for (const p of rest) {
      if (!node) return undefined;
      node = firstChild(node, p);
    }
    return node;
  }

  /**
   * Get an element if it exists, or create it if it doesn't.
   *
   * @param path dotted path from this document or `at`
   * @param after element after which to place the new element if it doesn't exist
   * @param at element at which to start looking (defaults to this document)
   */
  ensureElement(path: string, after: XEl, at?: XEl): XEl {
    let node = this.getElement(path, at);
    if (!node) {
      // Only the last segment is created: intermediate elements must exist already.
      node = this.makeElement(path.split(".").pop() ?? path);
      insertAfter(this.root, after, node);
    }
    return node;
  }

  /** A new, empty, detached element in this document's namespace. */
  makeElement(name: string): XEl {
    return x(this.prefix ? `${this.prefix}:${name}` : name);
  }
}
