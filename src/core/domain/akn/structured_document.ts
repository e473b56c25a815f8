// structured_document.ts
// Documents with a known Akoma Ntoso document structure (act, judgment, ...):
// shape validation, typed metadata accessors and FRBR URI synchronization.
//
// The class hierarchy mirrors the standard: StructuredDocument is extended by
// one class per structure type (hierarchicalStructure, debateStructure, ...),
// which is extended by one class per document type (act, bill, debate, ...).
// Document type classes only declare constants.
import type { Element as XEl } from "xast";
import { toXml } from "xast-util-to-xml";
import { x } from "xastscript";
import { AkomaNtosoDocument } from "./document.ts";
import { lookupDocumentType } from "./registry.ts";
import { FrbrUri } from "../frbr_uri.ts";
import { formatDate, parseDate, today, type DateInput, type PlainDate } from "../dates.ts";
import {
  childElements,
  findDescendant,
  getAttr,
  localName,
  removeChild,
  setAttr,
  insertFirst,
  type XmlInput,
} from "../parse/xast_xml.ts";
import { AKN_NAMESPACES, DEFAULT_VERSION, versionOf, type AknVersion } from "../parse/namespaces.ts";
import { ElementNotFoundError, ValidationError } from "../../shared/errors.ts";
import { resolveConfig, type DocumentOptions } from "../../shared/config.ts";
import { createChildLogger } from "../../shared/logger.ts";

const log = createChildLogger({ module: "structured_document" });

/** Component containers under the primary document, and the element each holds. */
const COMPONENT_CONTAINERS: ReadonlyMap<string, string> = new Map([
  ["attachments", "attachment"],
  ["components", "component"],
]);

/** Attribute values of the skeleton's primary document element. */
export type SkeletonAttributes = Record<string, string>;

/** The static side of a document type class. */
export interface DocumentKind {
  /** Structural type, eg. `hierarchicalStructure` */
  readonly structureType: string;
  /** Main content element of the structural type, eg. `body` */
  readonly mainContentTag: string;
  /** Document type, the name of the primary document element, eg. `act` */
  readonly documentType: string;

  new (xml?: XmlInput, options?: DocumentOptions): StructuredDocument;
  emptyDocument(version?: AknVersion, options?: DocumentOptions): string;
  emptyDocumentContent(): XEl;
  emptyDocumentAttrs(): SkeletonAttributes;
}

function isDocumentKind(value: unknown): value is DocumentKind {
  return typeof value === "function" && "documentType" in value && "mainContentTag" in value;
}

export class StructuredDocument extends AkomaNtosoDocument {
  static readonly structureType: string = "";
  static readonly mainContentTag: string = "";
  static readonly documentType: string = "";

  /** The registered document type class for `documentType`, compared case-insensitively. */
  static forDocumentType(documentType: string): DocumentKind | undefined {
    return lookupDocumentType(documentType);
  }

  /** XML for an empty document of this type, using the given AKN version. */
  static emptyDocument(this: DocumentKind, version: AknVersion = DEFAULT_VERSION, options: DocumentOptions = {}): string {
    const { source, country, language } = resolveConfig(options);
    const date = formatDate(today());
    const frbrUri = new FrbrUri({
      prefix: version === "2.0" ? "" : "akn",
      country,
      doctype: this.documentType,
      date,
      number: "1",
      workComponent: "main",
      language,
    });

    const doc = x(
      "akomaNtoso",
      { xmlns: AKN_NAMESPACES[version] },
      x(
        this.documentType,
        this.emptyDocumentAttrs(),
        x(
          "meta",
          {},
          x(
            "identification",
            { source: `#${source.id}` },
            x(
              "FRBRWork",
              {},
              x("FRBRthis", { value: frbrUri.workUri() }),
              x("FRBRuri", { value: frbrUri.workUri(false) }),
              x("FRBRalias", { value: "Untitled", name: "title" }),
              x("FRBRdate", { date, name: "Generation" }),
              x("FRBRauthor", { href: "" }),
              x("FRBRcountry", { value: frbrUri.place }),
              x("FRBRnumber", { value: frbrUri.number }),
            ),
            x(
              "FRBRExpression",
              {},
              x("FRBRthis", { value: frbrUri.expressionUri() }),
              x("FRBRuri", { value: frbrUri.expressionUri(false) }),
              x("FRBRdate", { date, name: "Generation" }),
              x("FRBRauthor", { href: "" }),
              x("FRBRlanguage", { language: frbrUri.language }),
            ),
            x(
              "FRBRManifestation",
              {},
              x("FRBRthis", { value: frbrUri.manifestationUri() }),
              x("FRBRuri", { value: frbrUri.manifestationUri(false) }),
              x("FRBRdate", { date, name: "Generation" }),
              x("FRBRauthor", { href: "" }),
            ),
          ),
          x(
            "references",
            { source: `#${source.id}` },
            x("TLCOrganization", { eId: source.id, href: source.url, showAs: source.name }),
          ),
        ),
        this.emptyDocumentContent(),
      ),
    );
    return toXml(doc, { closeEmptyElements: true, tightClose: true });
  }

  /** Content of the main content element in an empty document. */
  static emptyDocumentContent(this: DocumentKind): XEl {
    return x(this.mainContentTag);
  }

  static emptyDocumentAttrs(this: DocumentKind): SkeletonAttributes {
    return { name: this.documentType.toLowerCase() };
  }

  /** Setup a new instance with `xml`, or an empty document if no XML is given. */
  constructor(xml?: XmlInput, options: DocumentOptions = {}) {
    super(xml || new.target.emptyDocument(DEFAULT_VERSION, options), options);
    log.debug({ documentType: this.documentType, namespace: this.namespace }, "document loaded");
  }

  /** The class of this instance, read through the prototype so it is usable during construction. */
  protected get kind(): DocumentKind {
    const ctor = this.constructor;
    if (!isDocumentKind(ctor)) throw new TypeError(`${ctor.name} is not a document type`);
    return ctor;
  }

  get structureType(): string {
    return this.kind.structureType;
  }

  get documentType(): string {
    return this.kind.documentType;
  }

  get mainContentTag(): string {
    return this.kind.mainContentTag;
  }

  /** The AKN version label of this document's namespace, eg. "3.0". */
  get version(): string | undefined {
    return versionOf(this.namespace);
  }

  /** Parse XML and ensure it's an Akoma Ntoso document of this type. Returns the root element. */
  override parse(xml: XmlInput): XEl {
    const root = super.parse(xml);

    const [first] = childElements(root);
    if (!first) {
      throw new ValidationError("XML root element must have at least one child");
    }

    const name = localName(first.name);
    if (name !== this.documentType) {
      throw new ValidationError(`Expected ${this.documentType} as first child of root element, but got ${name} instead`, {
        expected: this.documentType,
        actual: name,
      });
    }
    return root;
  }

  /**
   * Named accessors for the first segment of dotted paths: `main`, `meta`,
   * `mainContent`, plus the document type (eg. `act`) and content tag (eg.
   * `body`) as aliases for `main` and `mainContent`.
   */
  protected override resolveSegment(name: string): XEl | undefined {
    switch (name) {
      case "main":
      case this.documentType:
        return this.main;
      case "mainContent":
      case this.mainContentTag:
        return this.getElement(this.mainContentTag, this.main);
      case "meta":
        return this.getElement("meta", this.main);
      default:
        return super.resolveSegment(name);
    }
  }

  /** The element an alias (`main`, `mainContent`, the document type or content tag) stands for. */
  alias(name: string): XEl | undefined {
    return this.resolveSegment(name);
  }

  /** The primary document element. */
  get main(): XEl {
    return this.requireElement(this.documentType, this.root);
  }

  /** The main content element of the document. */
  get mainContent(): XEl {
    return this.requireElement(this.mainContentTag, this.main);
  }

  get meta(): XEl {
    return this.requireElement("meta", this.main);
  }

  /** Look up a required element, failing with ElementNotFoundError. */
  protected requireElement(path: string, at: XEl): XEl {
    const node = this.getElement(path, at);
    if (!node) throw new ElementNotFoundError(path, localName(at.name));
    return node;
  }

  private get work(): XEl {
    return this.requireElement("identification.FRBRWork", this.meta);
  }

  private get expression(): XEl {
    return this.requireElement("identification.FRBRExpression", this.meta);
  }

  private get manifestation(): XEl {
    return this.requireElement("identification.FRBRManifestation", this.meta);
  }

  /** Short title. */
  get title(): string | undefined {
    // look for the FRBRalias element with name="title", falling back to any alias
    let title: string | undefined;
    for (const alias of childElements(this.work, "FRBRalias")) {
      if (getAttr(alias, "name") === "title") return getAttr(alias, "value");
      title = getAttr(alias, "value");
    }
    return title;
  }

  set title(value: string) {
    const work = this.work;
    let alias = childElements(work, "FRBRalias").find((a) => getAttr(a, "name") === "title");
    if (!alias) {
      alias = this.ensureElement("meta.identification.FRBRWork.FRBRalias", this.requireElement("FRBRuri", work));
      setAttr(alias, "name", "title");
    }
    setAttr(alias, "value", value);
  }

  private readDate(block: XEl): PlainDate | undefined {
    const value = getAttr(this.requireElement("FRBRdate", block), "date");
    return value ? parseDate(value) : undefined;
  }

  private writeDate(block: XEl, value: DateInput): void {
    setAttr(this.requireElement("FRBRdate", block), "date", formatDate(value));
  }

  /** Date from the FRBRWork element. */
  get workDate(): PlainDate | undefined {
    return this.readDate(this.work);
  }

  set workDate(value: DateInput) {
    this.writeDate(this.work, value);
  }

  /** Date from the FRBRExpression element. */
  get expressionDate(): PlainDate | undefined {
    return this.readDate(this.expression);
  }

  set expressionDate(value: DateInput) {
    this.writeDate(this.expression, value);
    // expression URIs carry the expression date
    this.resyncFrbrUri();
  }

  /** Date from the FRBRManifestation element. */
  get manifestationDate(): PlainDate | undefined {
    return this.readDate(this.manifestation);
  }

  set manifestationDate(value: DateInput) {
    this.writeDate(this.manifestation, value);
  }

  /** The 3-letter ISO-639-2 language code of this document. */
  get language(): string {
    return getAttr(this.requireElement("FRBRlanguage", this.expression), "language") || "eng";
  }

  set language(value: string) {
    setAttr(this.requireElement("FRBRlanguage", this.expression), "language", value);
    this.resyncFrbrUri();
  }

  /** The FRBR Manifestation URI that uniquely identifies this document universally. */
  get frbrUri(): FrbrUri | undefined {
    const uri = getAttr(this.requireElement("FRBRuri", this.manifestation), "value");
    return uri ? FrbrUri.parse(uri) : undefined;
  }

  /**
   * Set the FRBR URI of this document and of every component. Language and
   * expression date always come from the document itself.
   */
  set frbrUri(value: FrbrUri | string) {
    const uri = typeof value === "string" ? FrbrUri.parse(value) : value.clone();

    const expressionDate = this.expressionDate;
    if (!expressionDate) {
      throw new ValidationError("FRBRExpression has no date, so the expression URI cannot be written");
    }
    uri.language = this.language;
    uri.expressionDate = "@" + formatDate(expressionDate);
    if (!uri.workComponent) uri.workComponent = "main";

    const components = this.components();
    for (const [component, element] of components) {
      uri.workComponent = component;
      this.writeIdentification(this.identificationOf(element), uri);
    }
    log.debug({ uri: uri.uri(), components: [...components.keys()] }, "FRBR URIs synchronized");
  }

  /** The FRBR Expression URI; an empty value when the document has none. */
  expressionFrbrUri(): FrbrUri {
    const uri = getAttr(this.requireElement("FRBRuri", this.expression), "value");
    return uri ? FrbrUri.parse(uri) : FrbrUri.empty();
  }

  /**
   * Components of this document, by name: the document itself, then each
   * `<component>` and `<attachment>` inside it, in document order. Names come
   * from the work component of each one's FRBRWork/FRBRthis.
   */
  components(): Map<string, XEl> {
    const components = new Map<string, XEl>();
    components.set(this.workComponentOf(this.meta), this.main);

    for (const group of childElements(this.main)) {
      const item = COMPONENT_CONTAINERS.get(localName(group.name));
      if (!item) continue;
      for (const wrapper of childElements(group, item)) {
        for (const doc of childElements(wrapper)) {
          const meta = this.getElement("meta", doc);
          if (meta) components.set(this.workComponentOf(meta), doc);
        }
      }
    }
    return components;
  }

  private workComponentOf(meta: XEl): string {
    const thisUri = getAttr(this.requireElement("identification.FRBRWork.FRBRthis", meta), "value") ?? "";
    return FrbrUri.parse(thisUri).workComponent ?? "";
  }

  private identificationOf(component: XEl): XEl {
    const meta = findDescendant(
      component,
      (el) => localName(el.name) === "meta" && childElements(el, "identification").length > 0,
    );
    if (!meta) throw new ElementNotFoundError("meta.identification", localName(component.name));
    return this.requireElement("identification", meta);
  }

  private writeIdentification(ident: XEl, uri: FrbrUri): void {
    const work = this.requireElement("FRBRWork", ident);
    setAttr(this.requireElement("FRBRuri", work), "value", uri.uri());
    setAttr(this.requireElement("FRBRthis", work), "value", uri.workUri());
    const country = this.requireElement("FRBRcountry", work);
    setAttr(country, "value", uri.place);
    setAttr(this.ensureElement("FRBRnumber", country, work), "value", uri.number);

    if (uri.subtype) {
      setAttr(this.ensureElement("FRBRsubtype", country, work), "value", uri.subtype);
    } else {
      const subtype = this.getElement("FRBRsubtype", work);
      if (subtype) removeChild(work, subtype);
    }

    const expression = this.requireElement("FRBRExpression", ident);
    setAttr(this.requireElement("FRBRuri", expression), "value", uri.expressionUri(false));
    setAttr(this.requireElement("FRBRthis", expression), "value", uri.expressionUri());

    // Manifestation URIs are written in their expression form.
    const manifestation = this.requireElement("FRBRManifestation", ident);
    setAttr(this.requireElement("FRBRuri", manifestation), "value", uri.expressionUri(false));
    setAttr(this.requireElement("FRBRthis", manifestation), "value", uri.expressionUri());
  }

  /** Rewrite every FRBR URI after a change to language or expression date. */
  private resyncFrbrUri(): void {
    const current = this.frbrUri;
    if (current) this.frbrUri = current;
  }

  /** Get or create the lifecycle metadata block, with this document's source recorded on it. */
  ensureLifecycle(): XEl {
    const after = this.getElement("meta.publication") ?? this.requireElement("identification", this.meta);
    const node = this.ensureElement("meta.lifecycle", after);

    if (!getAttr(node, "source")) {
      setAttr(node, "source", `#${this.source.id}`);
      this.ensureReference("TLCOrganization", this.source.name, this.source.id, this.source.url);
      log.debug({ source: this.source.id }, "lifecycle created");
    }
    return node;
  }

  /** Get or create a reference of kind `elem` (eg. TLCOrganization) with eId `id`. */
  ensureReference(elem: string, name: string, id: string, href: string): XEl {
    const references = this.ensureElement("meta.references", this.ensureLifecycle());

    let ref = childElements(references, elem).find((r) => getAttr(r, "eId") === id);
    if (!ref) {
      ref = this.makeElement(elem);
      setAttr(ref, "eId", id);
      setAttr(ref, "href", href);
      setAttr(ref, "showAs", name);
      insertFirst(references, ref);
    }
    return ref;
  }
}
