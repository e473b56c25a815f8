import { StructuredDocument } from "../structured_document.ts";
import { registerDocumentType } from "../registry.ts";

export class DebateStructure extends StructuredDocument {
  static override readonly structureType: string = "debateStructure";
  static override readonly mainContentTag: string = "debateBody";
}

export class Debate extends DebateStructure {
  static override readonly documentType: string = "debate";
}

export class DebateReport extends DebateStructure {
  static override readonly documentType: string = "debateReport";
}

registerDocumentType(Debate);
registerDocumentType(DebateReport);
