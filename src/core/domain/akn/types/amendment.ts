import { StructuredDocument } from "../structured_document.ts";
import { registerDocumentType } from "../registry.ts";

export class AmendmentStructure extends StructuredDocument {
  static override readonly structureType: string = "amendmentStructure";
  static override readonly mainContentTag: string = "amendmentBody";
}

export class Amendment extends AmendmentStructure {
  static override readonly documentType: string = "amendment";
}

registerDocumentType(Amendment);
