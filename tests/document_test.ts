import { test } from "node:test";
import assert from "node:assert/strict";
import { Buffer } from "node:buffer";
import { AkomaNtosoDocument } from "../src/core/domain/akn/document.ts";
import { ValidationError } from "../src/core/shared/errors.ts";
import { AKN2, AKN3 } from "./helpers.ts";

const MINIMAL = `<akomaNtoso xmlns="${AKN3}"><act><meta/><body/></act></akomaNtoso>`;

test("parses an Akoma Ntoso document and detects its namespace", () => {
  const doc = new AkomaNtosoDocument(MINIMAL);
  assert.equal(doc.root.name, "akomaNtoso");
  assert.equal(doc.namespace, AKN3);
});

test("accepts an XML declaration with an encoding", () => {
  const doc = new AkomaNtosoDocument(`<?xml version="1.0" encoding="UTF-8"?>\n${MINIMAL}`);
  assert.equal(doc.namespace, AKN3);
});

test("accepts bytes in a declared encoding", () => {
  const xml = `<?xml version="1.0" encoding="ISO-8859-1"?><akomaNtoso xmlns="${AKN2}"><act><body>Café</body></act></akomaNtoso>`;
  const doc = new AkomaNtosoDocument(Buffer.from(xml, "latin1"));
  assert.equal(doc.namespace, AKN2);
  assert.equal(doc.toXml(), `<akomaNtoso xmlns="${AKN2}"><act><body>Café</body></act></akomaNtoso>`);
});

test("rejects a root element that is not akomaNtoso", () => {
  assert.throws(() => new AkomaNtosoDocument(`<foo xmlns="${AKN3}"/>`), {
    name: "ValidationError",
    message: "XML root element must be akomaNtoso, but got foo instead",
  });
});

test("rejects documents without a known namespace", () => {
  assert.throws(() => new AkomaNtosoDocument("<akomaNtoso><act/></akomaNtoso>"), {
    name: "ValidationError",
    message:
      `Expected to find one of the following Akoma Ntoso XML namespaces: ${AKN3}, ${AKN2}. ` +
      "Only these namespaces were found: ",
  });
});

test("malformed markup fails with the parser's error", () => {
  assert.throws(
    () => new AkomaNtosoDocument("<akomaNtoso"),
    (err: unknown) => err instanceof Error && !(err instanceof ValidationError),
  );
});

test("getElement follows a dotted path from the root", () => {
  const doc = new AkomaNtosoDocument(MINIMAL);
  const meta = doc.getElement("act.meta");
  assert.equal(meta?.name, "meta");
  assert.equal(doc.getElement("act.missing"), undefined);
  assert.equal(doc.getElement("missing.meta"), undefined);
});

test("getElement starts at a given element", () => {
  const doc = new AkomaNtosoDocument(MINIMAL);
  const act = doc.getElement("act");
  assert.ok(act);
  assert.equal(doc.getElement("body", act)?.name, "body");
});

test("ensureElement returns an existing element untouched", () => {
  const doc = new AkomaNtosoDocument(MINIMAL);
  const meta = doc.getElement("act.meta");
  const body = doc.getElement("act.body");
  assert.ok(meta && body);
  assert.equal(doc.ensureElement("act.body", meta), body);
  assert.equal(doc.toXml(), MINIMAL);
});

test("ensureElement creates the last segment after the given element", () => {
  const doc = new AkomaNtosoDocument(MINIMAL);
  const meta = doc.getElement("act.meta");
  assert.ok(meta);
  const preface = doc.ensureElement("act.preface", meta);
  assert.equal(preface.name, "preface");
  assert.equal(doc.toXml(), `<akomaNtoso xmlns="${AKN3}"><act><meta/><preface/><body/></act></akomaNtoso>`);
  assert.equal(doc.ensureElement("act.preface", meta), preface);
});

test("makeElement uses the prefix the namespace is bound to", () => {
  const doc = new AkomaNtosoDocument(`<akn:akomaNtoso xmlns:akn="${AKN3}"><akn:act/></akn:akomaNtoso>`);
  const el = doc.makeElement("meta");
  assert.equal(el.name, "akn:meta");
  assert.equal(el.children.length, 0);
  assert.equal(doc.getElement("act")?.name, "akn:act");
});

test("toXml round-trips markup", () => {
  assert.equal(new AkomaNtosoDocument(MINIMAL).toXml(), MINIMAL);
});

test("toXml pretty-prints without changing the tree", () => {
  const doc = new AkomaNtosoDocument(MINIMAL);
  assert.equal(
    doc.toXml({ pretty: true }),
    `<akomaNtoso xmlns="${AKN3}">\n  <act>\n    <meta/>\n    <body/>\n  </act>\n</akomaNtoso>`,
  );
  assert.equal(doc.toXml(), MINIMAL);
});

test("toXml passes serializer options through", () => {
  const doc = new AkomaNtosoDocument(MINIMAL);
  assert.equal(
    doc.toXml({ closeEmptyElements: false }),
    `<akomaNtoso xmlns="${AKN3}"><act><meta></meta><body></body></act></akomaNtoso>`,
  );
  assert.equal(doc.toXml({ declaration: true }), `<?xml version="1.0" encoding="UTF-8"?>\n${MINIMAL}`);
});

test("toXmlBytes encodes in the requested encoding", () => {
  const doc = new AkomaNtosoDocument(MINIMAL);
  const body = doc.getElement("act.body");
  assert.ok(body);
  body.children.push({ type: "text", value: "Café" });

  const bytes = doc.toXmlBytes({ encoding: "latin1", declaration: true });
  assert.equal(
    Buffer.from(bytes).toString("latin1"),
    `<?xml version="1.0" encoding="ISO-8859-1"?>\n<akomaNtoso xmlns="${AKN3}"><act><meta/><body>Café</body></act></akomaNtoso>`,
  );
  assert.equal(Buffer.from(doc.toXmlBytes()).toString("utf-8"), doc.toXml());
});

function withBodyText(text: string): AkomaNtosoDocument {
  const doc = new AkomaNtosoDocument(MINIMAL);
  const body = doc.getElement("act.body");
  assert.ok(body);
  body.children.push({ type: "text", value: text });
  return doc;
}

function bodyText(doc: AkomaNtosoDocument): string | undefined {
  const text = doc.getElement("act.body")?.children[0];
  return text?.type === "text" ? text.value : undefined;
}

test("toXmlBytes writes characters outside latin1 as character references", () => {
  const doc = withBodyText("Café Wāhi");
  const bytes = doc.toXmlBytes({ encoding: "latin1", declaration: true });
  assert.equal(
    Buffer.from(bytes).toString("latin1"),
    `<?xml version="1.0" encoding="ISO-8859-1"?>\n<akomaNtoso xmlns="${AKN3}"><act><meta/><body>Café W&#257;hi</body></act></akomaNtoso>`,
  );
  assert.equal(bodyText(new AkomaNtosoDocument(bytes)), "Café Wāhi");
});

test("toXmlBytes writes characters outside ascii as character references", () => {
  const doc = withBodyText("Café Wāhi");
  const bytes = doc.toXmlBytes({ encoding: "ascii", declaration: true });
  assert.equal(
    Buffer.from(bytes).toString("latin1"),
    `<?xml version="1.0" encoding="US-ASCII"?>\n<akomaNtoso xmlns="${AKN3}"><act><meta/><body>Caf&#233; W&#257;hi</body></act></akomaNtoso>`,
  );
  assert.equal(bodyText(new AkomaNtosoDocument(bytes)), "Café Wāhi");
});

test("toXmlBytes marks utf-16le output with a byte order mark and reads it back", () => {
  const doc = withBodyText("Wāhi");
  const bytes = doc.toXmlBytes({ encoding: "utf-16le", declaration: true });
  assert.deepEqual([...bytes.subarray(0, 4)], [0xff, 0xfe, 0x3c, 0x00]);
  assert.equal(bodyText(new AkomaNtosoDocument(bytes)), "Wāhi");
});

test("rejects bytes declaring an unknown encoding", () => {
  const bytes = Buffer.from(`<?xml version="1.0" encoding="x-unknown"?>${MINIMAL}`, "utf-8");
  assert.throws(() => new AkomaNtosoDocument(bytes), ValidationError);
});

test("source comes from the document options", () => {
  const doc = new AkomaNtosoDocument(MINIMAL, { source: { name: "Tool", id: "tool", url: "/ontology/organization/tool" } });
  assert.deepEqual(doc.source, { name: "Tool", id: "tool", url: "/ontology/organization/tool" });
});
