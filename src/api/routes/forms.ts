/**
 * Form Analysis Routes
 *
 * Endpoints:
 * - POST /v1/forms/analyze - Analyze a PDF (JSON with base64, or raw application/pdf)
 * - POST /v1/forms/overlay - Overlay shapes for one page of a PDF
 * - GET /v1/forms/info - Capabilities and default options
 */

import { Hono, type Context } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { FormFieldAnalyzer } from '../../core/form-analyzer.js';
import { DEFAULT_OVERLAY_ZOOM, buildPageOverlay } from '../../core/report-builder.js';
import { PATTERN_KINDS, WIDGET_TYPE_CODES } from '../../core/type-classifier.js';
import {
  buildStructuredError,
  classifyErrorCode,
  structuredLoadError,
  type StructuredError,
} from '../../types/errors.js';
import { FIELD_TYPES, type AnalysisOutcome } from '../../types/form-fields.js';
import {
  analysisOptionsSchema,
  parseAnalysisOptions,
  type AnalysisOptionsInput,
} from '../../utils/config-schemas.js';
import { logger } from '../../utils/logger.js';
import type { ApiDependencies, ApiEnv } from '../types.js';

// ============================================
// Request Validators
// ============================================

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const DATA_URL_PREFIX = /^data:application\/pdf;base64,/;

const documentBodySchema = z.object({
  base64: z.string().min(1, 'base64 is required'),
  options: analysisOptionsSchema.optional(),
});

const overlayBodySchema = documentBodySchema.extend({
  pageIndex: z.number().int().min(0),
  zoom: z.number().positive().max(8).default(DEFAULT_OVERLAY_ZOOM),
});

/**
 * Issues under `options` are configuration errors; everything else is a
 * malformed request.
 */
function validationError(error: z.ZodError): StructuredError {
  const details = error.issues.map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`);
  const isOptionsError = error.issues.every((issue) => issue.path[0] === 'options');
  return buildStructuredError(
    isOptionsError ? 'Invalid analysis options' : 'Invalid request body',
    classifyErrorCode(isOptionsError ? 'CONFIG_INVALID_OPTION' : 'INVALID_INPUT'),
    { details }
  );
}

function errorResponse(c: Context<ApiEnv>, error: StructuredError) {
  return c.json({ success: false as const, error }, error.httpStatus);
}

// ============================================
// Helpers
// ============================================

type DecodeResult = { ok: true; bytes: Uint8Array } | { ok: false; error: StructuredError };

function decodeDocument(base64: string, maxUploadBytes: number): DecodeResult {
  const cleaned = base64.replace(DATA_URL_PREFIX, '').replace(/\s+/g, '');
  if (!BASE64_PATTERN.test(cleaned) || cleaned.length % 4 === 1) {
    return {
      ok: false,
      error: buildStructuredError('base64 is not valid base64', classifyErrorCode('INVALID_BASE64')),
    };
  }
  const bytes = Buffer.from(cleaned, 'base64');
  if (bytes.byteLength > maxUploadBytes) {
    return { ok: false, error: tooLarge(maxUploadBytes) };
  }
  return { ok: true, bytes: new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength) };
}

function tooLarge(maxUploadBytes: number): StructuredError {
  return buildStructuredError(
    `Document exceeds the ${maxUploadBytes} byte upload limit`,
    classifyErrorCode('PAYLOAD_TOO_LARGE')
  );
}

async function analyze(
  c: Context<ApiEnv>,
  bytes: Uint8Array,
  options: AnalysisOptionsInput | undefined
): Promise<AnalysisOutcome> {
  const analyzer = new FormFieldAnalyzer(options, logger.analyzer.child({ requestId: c.get('requestId') }));
  return analyzer.analyze(bytes);
}

// ============================================
// Routes
// ============================================

export function createFormRoutes(deps: ApiDependencies): Hono<ApiEnv> {
  const forms = new Hono<ApiEnv>();

  // base64 inflates the document by a third; leave room for the JSON around it
  const maxBodyBytes = Math.ceil((deps.maxUploadBytes * 4) / 3) + 64 * 1024;

  forms.use(
    '*',
    bodyLimit({
      maxSize: maxBodyBytes,
      onError: (c) => c.json({ success: false as const, error: tooLarge(deps.maxUploadBytes) }, 413),
    })
  );

  /**
   * POST /v1/forms/analyze
   *
   * JSON body: { base64, options? }, or the document itself with
   * Content-Type: application/pdf.
   */
  forms.post('/analyze', async (c) => {
    let bytes: Uint8Array;
    let options: AnalysisOptionsInput | undefined;

    const contentType = c.req.header('content-type') ?? '';
    if (contentType.startsWith('application/pdf')) {
      bytes = new Uint8Array(await c.req.arrayBuffer());
      if (bytes.byteLength > deps.maxUploadBytes) {
        return errorResponse(c, tooLarge(deps.maxUploadBytes));
      }
    } else {
      const raw: unknown = await c.req.json().catch(() => undefined);
      if (raw === undefined) {
        return errorResponse(
          c,
          buildStructuredError('Body must be JSON or application/pdf', classifyErrorCode('INVALID_INPUT'))
        );
      }
      const parsed = documentBodySchema.safeParse(raw);
      if (!parsed.success) {
        return errorResponse(c, validationError(parsed.error));
      }
      const decoded = decodeDocument(parsed.data.base64, deps.maxUploadBytes);
      if (!decoded.ok) {
        return errorResponse(c, decoded.error);
      }
      bytes = decoded.bytes;
      options = parsed.data.options;
    }

    const outcome = await analyze(c, bytes, options);
    if (!outcome.success) {
      return errorResponse(c, structuredLoadError(outcome.error));
    }
    return c.json({ success: true as const, report: outcome.report });
  });

  /**
   * POST /v1/forms/overlay
   *
   * JSON body: { base64, pageIndex, zoom?, options? }. Returns the shapes to
   * draw over the page, plus the rendered page when a renderer is configured.
   */
  forms.post(
    '/overlay',
    zValidator('json', overlayBodySchema, (result, c) => {
      if (!result.success) {
        return c.json({ success: false as const, error: validationError(result.error) }, 400);
      }
    }),
    async (c) => {
      const body = c.req.valid('json');
      const decoded = decodeDocument(body.base64, deps.maxUploadBytes);
      if (!decoded.ok) {
        return errorResponse(c, decoded.error);
      }

      const outcome = await analyze(c, decoded.bytes, body.options);
      if (!outcome.success) {
        return errorResponse(c, structuredLoadError(outcome.error));
      }

      const { report } = outcome;
      if (body.pageIndex >= report.pages.length) {
        return errorResponse(
          c,
          buildStructuredError(
            `pageIndex ${body.pageIndex} is out of range (document has ${report.pages.length} pages)`,
            classifyErrorCode('INVALID_INPUT')
          )
        );
      }

      const overlay = buildPageOverlay(report, body.pageIndex, { zoom: body.zoom });
      if (!deps.renderer) {
        return c.json({ success: true as const, overlay });
      }

      const image = await deps.renderer.renderPage(decoded.bytes, body.pageIndex, body.zoom);
      return c.json({
        success: true as const,
        overlay,
        image: {
          mimeType: image.mimeType,
          width: image.width,
          height: image.height,
          base64: Buffer.from(image.data).toString('base64'),
        },
      });
    }
  );

  /**
   * GET /v1/forms/info
   */
  forms.get('/info', (c) => {
    return c.json({
      success: true as const,
      capabilities: {
        fieldTypes: [...FIELD_TYPES],
        widgetTypeCodes: WIDGET_TYPE_CODES,
        patternKinds: PATTERN_KINDS,
        detectionMethods: ['widget', 'layout', 'visual'],
        rendering: deps.renderer !== undefined,
      },
      limits: {
        maxUploadBytes: deps.maxUploadBytes,
      },
      defaults: parseAnalysisOptions(),
      endpoints: {
        analyze: { method: 'POST', path: '/v1/forms/analyze' },
        overlay: { method: 'POST', path: '/v1/forms/overlay' },
      },
    });
  });

  return forms;
}
