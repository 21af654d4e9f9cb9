import type { CourseContentSource } from '../../domain/services/CourseContentSource';
import type { IndexingService, IndexResult } from '../../domain/services/IndexingService';
import { log } from '../../utils/logger';

export interface IndexCourseFromMoodleInput {
  courseId: number;
}

export interface IndexCourseFromMoodleOutput extends IndexResult {
  course_name: string;
  documents_extracted: number;
}

export class IndexCourseFromMoodleUseCase {
  constructor(
    private contentSource: CourseContentSource,
    private indexingService: IndexingService
  ) {}

  async execute(input: IndexCourseFromMoodleInput): Promise<IndexCourseFromMoodleOutput> {
    const { courseId } = input;

    // Extraction failures propagate: a failed pull must not wipe the existing index
    const { courseName, documents } = await this.contentSource.extractCourseDocuments(courseId);
    log('info', 'Course content extracted', { courseId, courseName, documents: documents.length });

    const result = await this.indexingService.indexCourse(courseId, courseName, documents);

    return {
      ...result,
      course_name: courseName,
      documents_extracted: documents.length,
    };
  }
}
