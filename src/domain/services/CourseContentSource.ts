import type { ExtractedCourse } from '../entities/CourseDocument';

export interface CourseContentSource {
  extractCourseDocuments(courseId: number): Promise<ExtractedCourse>;
}
