export const DOCUMENT_TYPES = ['page', 'file', 'url', 'label', 'section', 'file_upload'] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export interface CourseDocument {
  type: DocumentType;
  source: string;  // Human-readable origin label, e.g. "Page: Week 1"
  content: string; // Plain text, HTML already stripped
}

export interface ExtractedCourse {
  courseName: string;
  documents: CourseDocument[];
}

export interface ChunkPayload {
  text: string;
  course_id: number;
  course_name: string;
  source: string;
  type: DocumentType;
  doc_index: number;
  chunk_index: number;
}

export interface IndexedPoint {
  id: number;
  vector: number[];
  payload: ChunkPayload;
}

// Documents (and chunks) this short carry no retrievable meaning
export const MIN_CONTENT_LENGTH = 50;

export function isDocumentType(value: string): value is DocumentType {
  return DOCUMENT_TYPES.some((type) => type === value);
}

export function collectionNameForCourse(courseId: number): string {
  return `course_${courseId}_chunks`;
}
