import { StructuredDocument } from "../structured_document.ts";
import { registerDocumentType } from "../registry.ts";

export class OpenStructure extends StructuredDocument {
  static override readonly structureType: string = "openStructure";
  static override readonly mainContentTag: string = "mainBody";
}

export class Doc extends OpenStructure {
  static override readonly documentType: string = "doc";
}

export class Statement extends OpenStructure {
  static override readonly documentType: string = "statement";
}

registerDocumentType(Doc);
registerDocumentType(Statement);
