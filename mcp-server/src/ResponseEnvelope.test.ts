import { describe, it, expect } from 'vitest';
import { documentNotFound, validationError } from './errors';
import { attempt, errorEnvelope, ok, toEnvelope, toToolResult } from './ResponseEnvelope';

describe('ResponseEnvelope', () => {
  it('turns thrown errors into engine faults', async () => {
    const outcome = await attempt(async () => { throw new Error('zip is truncated'); });
    expect(outcome).toMatchObject({ ok: false, fault: { kind: 'ENGINE_ERROR', message: 'zip is truncated' } });
  });

  it('keeps classified faults', async () => {
    const outcome = await attempt(async () => { throw documentNotFound('a.docx'); });
    expect(toEnvelope('DOC_LOAD_ERROR', outcome)).toEqual({
      success: false,
      message: 'Document file not found: a.docx',
      data: {},
      error: {
        code: 'DOC_LOAD_ERROR',
        type: 'DOCUMENT_NOT_FOUND',
        details: 'Document file not found: a.docx',
        suggestion: 'Please check if the document exists and is a valid Word document.',
      },
    });
  });

  it('passes success through', async () => {
    const outcome = await attempt(async () => ok('done', { count: 2 }));
    expect(toEnvelope('FORMAT_ERROR', outcome)).toEqual({ success: true, message: 'done', data: { count: 2 } });
  });

  it('marks only failures as tool errors', () => {
    const success = toToolResult({ success: true, message: 'done', data: {} });
    expect(success).toEqual({
      content: [{ type: 'text', text: '{\n  "success": true,\n  "message": "done",\n  "data": {}\n}' }],
    });

    const failure = toToolResult(errorEnvelope('FORMAT_ERROR', validationError('bad')));
    expect(failure.isError).toBe(true);
  });
});
