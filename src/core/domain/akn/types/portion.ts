import { StructuredDocument, type DocumentKind, type SkeletonAttributes } from "../structured_document.ts";
import { registerDocumentType } from "../registry.ts";

export class PortionStructure extends StructuredDocument {
  static override readonly structureType: string = "portionStructure";
  static override readonly mainContentTag: string = "portionBody";

  // <portion> requires includedIn, the work the portion was taken from
  static override emptyDocumentAttrs(this: DocumentKind): SkeletonAttributes {
    return { ...StructuredDocument.emptyDocumentAttrs.call(this), includedIn: "" };
  }
}

export class Portion extends PortionStructure {
  static override readonly documentType: string = "portion";
}

registerDocumentType(Portion);
