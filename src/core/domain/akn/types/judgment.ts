import { StructuredDocument } from "../structured_document.ts";
import { registerDocumentType } from "../registry.ts";

export class JudgmentStructure extends StructuredDocument {
  static override readonly structureType: string = "judgmentStructure";
  static override readonly mainContentTag: string = "judgmentBody";
}

export class Judgment extends JudgmentStructure {
  static override readonly documentType: string = "judgment";
}

registerDocumentType(Judgment);
