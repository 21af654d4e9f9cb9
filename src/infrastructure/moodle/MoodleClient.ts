import { z } from 'zod';
import type { CourseDocument, ExtractedCourse } from '../../domain/entities/CourseDocument';
import type { CourseContentSource } from '../../domain/services/CourseContentSource';
import { MoodleError, NotFoundError } from '../../domain/errors';
import { htmlToText } from '../../utils/html';
import { errorMessage, log } from '../../utils/logger';

export interface MoodleClientConfig {
  url: string;
  token: string;
  extractPages: boolean;
  extractFiles: boolean;
  maxFileSizeMb: number;
  requestTimeoutMs?: number;
  retries?: number;
}

export interface MoodleClientDeps {
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

const moduleContentSchema = z.object({
  type: z.string(),
  filename: z.string().optional(),
  fileurl: z.string().optional(),
  filesize: z.number().optional(),
  content: z.string().optional(),
});

const moduleSchema = z.object({
  id: z.number(),
  name: z.string().optional(),
  modname: z.string(),
  description: z.string().optional(),
  contents: z.array(moduleContentSchema).optional(),
});

const sectionSchema = z.object({
  id: z.number(),
  name: z.string().optional(),
  summary: z.string().optional(),
  modules: z.array(moduleSchema).optional(),
});

const coursesSchema = z.array(z.object({ id: z.number(), fullname: z.string().optional() }));
const contentsSchema = z.array(sectionSchema);

const exceptionSchema = z.object({
  exception: z.string(),
  errorcode: z.string().optional(),
  message: z.string().optional(),
});

type MoodleModule = z.infer<typeof moduleSchema>;

const MIN_TEXT_LENGTH = 50;
const MIN_LINK_LENGTH = 30;

function parseResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, wsfunction: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new MoodleError(`Unexpected ${wsfunction} response: ${result.error.issues[0]?.message ?? 'invalid shape'}`);
  }
  return result.data;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Reads course structure through Moodle's REST web services
 * (core_course_get_courses, core_course_get_contents) and turns sections and
 * modules into plain-text documents.
 */
export class MoodleClient implements CourseContentSource {
  private endpoint: string;
  private fetchFn: typeof fetch;
  private sleep: (ms: number) => Promise<void>;

  constructor(
    private config: MoodleClientConfig,
    deps: MoodleClientDeps = {}
  ) {
    this.endpoint = `${config.url.replace(/\/+$/, '')}/webservice/rest/server.php`;
    this.fetchFn = deps.fetch ?? fetch;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async getCourseName(courseId: number): Promise<string> {
    const courses = parseResponse(
      coursesSchema,
      await this.callApi('core_course_get_courses', { 'options[ids][0]': String(courseId) }),
      'core_course_get_courses'
    );

    const course = courses[0];
    if (!course) {
      throw new NotFoundError(`Course ${courseId} not found in Moodle`);
    }
    return course.fullname ?? `Course ${courseId}`;
  }

  async extractCourseDocuments(courseId: number): Promise<ExtractedCourse> {
    log('info', 'Moodle extraction started', { courseId });

    const courseName = await this.getCourseName(courseId);
    const sections = parseResponse(
      contentsSchema,
      await this.callApi('core_course_get_contents', { courseid: String(courseId) }),
      'core_course_get_contents'
    );

    const documents: CourseDocument[] = [];

    sections.forEach((section, sectionIndex) => {
      const sectionName = section.name || `Section ${sectionIndex + 1}`;

      const summary = htmlToText(section.summary ?? '');
      if (summary.length > MIN_TEXT_LENGTH) {
        documents.push({
          type: 'section',
          source: `Section: ${sectionName}`,
          content: `Section: ${sectionName}\n\n${summary}`,
        });
      }

      for (const module of section.modules ?? []) {
        const document = this.extractModule(module, sectionName);
        if (document) {
          documents.push(document);
        }
      }
    });

    const typeCounts: Record<string, number> = {};
    for (const document of documents) {
      typeCounts[document.type] = (typeCounts[document.type] ?? 0) + 1;
    }
    log('info', 'Moodle extraction complete', { courseId, courseName, documents: documents.length, typeCounts });

    return { courseName, documents };
  }

  private extractModule(module: MoodleModule, sectionName: string): CourseDocument | null {
    switch (module.modname) {
      case 'page':
        return this.config.extractPages ? this.extractPage(module) : null;
      case 'resource':
        return this.config.extractFiles ? this.extractResource(module) : null;
      case 'url':
        return this.extractUrl(module);
      case 'label':
        return this.extractLabel(module, sectionName);
      default:
        return null;
    }
  }

  private extractPage(module: MoodleModule): CourseDocument | null {
    const name = module.name || 'Unnamed Page';
    const body = module.contents?.find((item) => item.type === 'content')?.content;
    if (!body) {
      return null;
    }

    const text = htmlToText(body);
    if (text.length < MIN_TEXT_LENGTH) {
      log('debug', 'Skipping short page', { name });
      return null;
    }

    return { type: 'page', source: `Page: ${name}`, content: `Page: ${name}\n\n${text}` };
  }

  // File bodies are not downloaded; the document describes the resource
  private extractResource(module: MoodleModule): CourseDocument | null {
    const name = module.name || 'Unnamed Resource';
    const file = module.contents?.[0];
    if (!file) {
      return null;
    }

    const filename = file.filename ?? '';
    const sizeMb = (file.filesize ?? 0) / (1024 * 1024);
    if (sizeMb > this.config.maxFileSizeMb) {
      log('warn', 'Skipping large file', {
        filename,
        sizeMb: Number(sizeMb.toFixed(1)),
        limitMb: this.config.maxFileSizeMb,
      });
      return null;
    }

    const description = htmlToText(module.description ?? '');
    const summary = description || `Course file resource "${name}".`;
    const content = `Resource: ${name}\nFilename: ${filename}\n\n${summary}`;

    return { type: 'file', source: `File: ${filename || name}`, content };
  }

  private extractUrl(module: MoodleModule): CourseDocument | null {
    const name = module.name || 'Unnamed URL';
    const externalUrl = module.contents?.[0]?.fileurl ?? '';
    const description = htmlToText(module.description ?? '');

    let content = `Link: ${name}\n`;
    if (externalUrl) {
      content += `URL: ${externalUrl}\n`;
    }
    if (description) {
      content += `\n${description}`;
    }

    if (content.trim().length < MIN_LINK_LENGTH) {
      return null;
    }
    return { type: 'url', source: `Link: ${name}`, content };
  }

  private extractLabel(module: MoodleModule, sectionName: string): CourseDocument | null {
    const text = htmlToText(module.description ?? '');
    if (text.length < MIN_TEXT_LENGTH) {
      return null;
    }
    return { type: 'label', source: `Label in ${sectionName}`, content: text };
  }

  private async callApi(wsfunction: string, params: Record<string, string>): Promise<unknown> {
    const retries = this.config.retries ?? 3;
    const body = new URLSearchParams({
      wstoken: this.config.token,
      wsfunction,
      moodlewsrestformat: 'json',
      ...params,
    });

    let lastError: unknown;

    for (let attempt = 1; attempt <= retries; attempt++) {
      try {
        log('debug', 'Calling Moodle API', { wsfunction, attempt, retries });

        const response = await this.fetchFn(this.endpoint, {
          method: 'POST',
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          body,
          signal: AbortSignal.timeout(this.config.requestTimeoutMs ?? 30000),
        });

        if (!response.ok) {
          throw new Error(`HTTP ${response.status} ${response.statusText}`);
        }

        const data: unknown = await response.json();
        const exception = exceptionSchema.safeParse(data);
        if (exception.success) {
          // Moodle-level errors (bad token, missing course) are not retried
          throw new MoodleError(`Moodle API error in ${wsfunction}: ${exception.data.message ?? exception.data.exception}`);
        }

        return data;
      } catch (error) {
        if (error instanceof MoodleError) {
          log('error', 'Moodle API error', { wsfunction, error: error.message });
          throw error;
        }

        lastError = error;
        log('warn', 'Moodle API call failed', { wsfunction, attempt, error: errorMessage(error) });

        if (attempt < retries) {
          await this.sleep(1000 * 2 ** (attempt - 1));
        }
      }
    }

    throw new MoodleError(`Failed to call ${wsfunction} after ${retries} attempts: ${errorMessage(lastError)}`, {
      cause: lastError,
      retryable: true,
    });
  }
}
