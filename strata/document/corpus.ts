import { Annotation, ModuleId } from "./annotation.js";
import { Document, DocumentSummary } from "./document.js";

export type CorpusAnnotationRecord = Annotation & {
  doc_id: string;
  language: string;
};

export class Corpus {
  private readonly documents: Document[] = [];

  constructor(public readonly name = "corpus") {}

  add(document: Document): void {
    this.documents.push(document);
  }

  get(doc_id: string): Document | undefined {
    return this.documents.find((doc) => doc.doc_id === doc_id);
  }

  list(): Document[] {
    return [...this.documents];
  }

  get size(): number {
    return this.documents.length;
  }

  allAnnotations(module?: ModuleId): CorpusAnnotationRecord[] {
    return this.documents.flatMap((doc) =>
      doc
        .getAnnotations({ module })
        .map((a) => ({ ...a, doc_id: doc.doc_id, language: doc.language }))
    );
  }

  summaryTable(): DocumentSummary[] {
    return this.documents.map((doc) => doc.summary());
  }
}

/**
 * JSON-lines rendering of the annotation stream, one annotation per line.
 */
export function annotationsToJsonl(records: CorpusAnnotationRecord[]): string {
  return records.map((record) => JSON.stringify(record)).join("\n");
}
