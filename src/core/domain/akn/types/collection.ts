import { StructuredDocument } from "../structured_document.ts";
import { registerDocumentType } from "../registry.ts";

export class CollectionStructure extends StructuredDocument {
  static override readonly structureType: string = "collectionStructure";
  static override readonly mainContentTag: string = "collectionBody";
}

/** `<collection>`, as written by documents that predate `documentCollection`. */
export class Collection extends CollectionStructure {
  static override readonly documentType: string = "collection";
}

export class DocumentCollection extends CollectionStructure {
  static override readonly documentType: string = "documentCollection";
}

export class AmendmentList extends CollectionStructure {
  static override readonly documentType: string = "amendmentList";
}

export class OfficialGazette extends CollectionStructure {
  static override readonly documentType: string = "officialGazette";
}

registerDocumentType(Collection);
registerDocumentType(DocumentCollection);
registerDocumentType(AmendmentList);
registerDocumentType(OfficialGazette);
