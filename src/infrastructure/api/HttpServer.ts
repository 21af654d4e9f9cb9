import type { Server } from 'node:http';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { z, ZodError } from 'zod';
import { DOCUMENT_TYPES } from '../../domain/entities/CourseDocument';
import { AppError, InvalidAIOutputError } from '../../domain/errors';
import type { IndexingService } from '../../domain/services/IndexingService';
import type { QuizService } from '../../domain/services/QuizService';
import type { RagService } from '../../domain/services/RagService';
import type { IndexCourseFromMoodleUseCase } from '../../application/usecases/IndexCourseFromMoodle';
import type { IngestFileUseCase } from '../../application/usecases/IngestFile';
import { errorMessage, log } from '../../utils/logger';

const courseIdSchema = z.coerce.number().int().nonnegative();

const chatSchema = z.object({
  course_id: courseIdSchema,
  question: z.string().min(1),
});

const quizSchema = z.object({
  content: z.string(),
  count: z.number().int().default(5),
  topic: z.string().optional(),
  course_id: courseIdSchema.optional(),
});

const indexSchema = z.object({
  course_name: z.string().optional(),
  documents: z
    .array(
      z.object({
        type: z.enum(DOCUMENT_TYPES),
        source: z.string().min(1),
        content: z.string(),
      })
    )
    .optional(),
});

const fileSchema = z.object({
  filename: z.string().min(1),
  content: z.string().min(1),  // base64
  course_name: z.string().optional(),
});

export interface HttpServerDeps {
  ragService: RagService;
  quizService: QuizService;
  indexingService: IndexingService;
  ingestFile: IngestFileUseCase;
  // null when Moodle is not configured
  indexCourseFromMoodle: IndexCourseFromMoodleUseCase | null;
  health: () => Record<string, unknown>;
}

function sendError(res: Response, error: unknown, route: string): void {
  if (error instanceof ZodError) {
    res.status(400).json({
      error: 'invalid_input',
      message: error.issues.map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`).join('; '),
    });
    return;
  }

  if (error instanceof AppError) {
    log(error.statusCode >= 500 ? 'error' : 'warn', `Request failed: ${route}`, {
      code: error.code,
      error: error.message,
    });
    res.status(error.statusCode).json({
      error: error.code,
      message: error.message,
      retryable: error.retryable,
      ...(error instanceof InvalidAIOutputError ? { raw_output: error.rawOutput } : {}),
    });
    return;
  }

  log('error', `Unhandled error: ${route}`, {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  res.status(500).json({ error: 'internal_error', message: 'Internal server error' });
}

export function createApp(deps: HttpServerDeps): Express {
  const app = express();
  app.use(express.json({ limit: '50mb' }));

  app.use((req: Request, _res: Response, next: NextFunction) => {
    log('debug', `${req.method} ${req.path}`);
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', ...deps.health() });
  });

  app.post('/chat', async (req: Request, res: Response) => {
    try {
      const { course_id, question } = chatSchema.parse(req.body);
      const result = await deps.ragService.answer(course_id, question);
      res.json(result);
    } catch (error) {
      sendError(res, error, 'POST /chat');
    }
  });

  app.post('/generate-quiz', async (req: Request, res: Response) => {
    try {
      const { content, count, topic } = quizSchema.parse(req.body);
      const quiz = await deps.quizService.generateQuiz(content, count, topic);
      res.json({ quiz });
    } catch (error) {
      sendError(res, error, 'POST /generate-quiz');
    }
  });

  app.get('/courses/:courseId/status', async (req: Request, res: Response) => {
    try {
      const courseId = courseIdSchema.parse(req.params.courseId);
      res.json(await deps.indexingService.getCourseStatus(courseId));
    } catch (error) {
      sendError(res, error, 'GET /courses/:courseId/status');
    }
  });

  app.post('/courses/:courseId/index', async (req: Request, res: Response) => {
    try {
      const courseId = courseIdSchema.parse(req.params.courseId);
      const { course_name, documents } = indexSchema.parse(req.body ?? {});

      if (documents) {
        const result = await deps.indexingService.indexCourse(courseId, course_name ?? `Course ${courseId}`, documents);
        res.json(result);
        return;
      }

      if (!deps.indexCourseFromMoodle) {
        res.status(503).json({
          error: 'moodle_not_configured',
          message: 'No documents supplied and Moodle extraction is not configured',
        });
        return;
      }

      res.json(await deps.indexCourseFromMoodle.execute({ courseId }));
    } catch (error) {
      sendError(res, error, 'POST /courses/:courseId/index');
    }
  });

  app.delete('/courses/:courseId/index', async (req: Request, res: Response) => {
    try {
      const courseId = courseIdSchema.parse(req.params.courseId);
      res.json(await deps.indexingService.deleteCourseIndex(courseId));
    } catch (error) {
      sendError(res, error, 'DELETE /courses/:courseId/index');
    }
  });

  app.post('/courses/:courseId/files', async (req: Request, res: Response) => {
    try {
      const courseId = courseIdSchema.parse(req.params.courseId);
      const { filename, content, course_name } = fileSchema.parse(req.body);

      const result = await deps.ingestFile.execute({
        courseId,
        courseName: course_name ?? `Course ${courseId}`,
        filename,
        content: Buffer.from(content, 'base64'),
      });
      res.json(result);
    } catch (error) {
      sendError(res, error, 'POST /courses/:courseId/files');
    }
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'not_found', message: 'Not found' });
  });

  // Reached only by body-parser failures; route handlers answer their own errors
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'invalid_input', message: `Malformed JSON body: ${error.message}` });
      return;
    }
    sendError(res, error, `${req.method} ${req.path}`);
  });

  return app;
}

export class HttpServer {
  private server: Server | null = null;

  constructor(
    private deps: HttpServerDeps,
    private port: number
  ) {}

  async start(): Promise<number> {
    const app = createApp(this.deps);

    const server = await new Promise<Server>((resolve, reject) => {
      const listening = app.listen(this.port, () => resolve(listening));
      listening.once('error', reject);
    });
    this.server = server;

    const address = server.address();
    const port = address && typeof address === 'object' ? address.port : this.port;
    log('info', `HTTP server running on port ${port}`);
    return port;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    log('info', 'HTTP server stopped');
  }
}
