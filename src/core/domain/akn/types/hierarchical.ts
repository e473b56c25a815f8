import { StructuredDocument } from "../structured_document.ts";
import { registerDocumentType } from "../registry.ts";

export class HierarchicalStructure extends StructuredDocument {
  static override readonly structureType: string = "hierarchicalStructure";
  static override readonly mainContentTag: string = "body";
}

export class Act extends HierarchicalStructure {
  static override readonly documentType: string = "act";
}

export class Bill extends HierarchicalStructure {
  static override readonly documentType: string = "bill";
}

registerDocumentType(Act);
registerDocumentType(Bill);
