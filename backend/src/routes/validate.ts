/**
 * routes/validate.ts — Zod-validated JSON handlers
 *
 * handle(schema, pick, fn) validates the picked request input, answers 400
 * with the failing fields, and otherwise wraps fn's result in the
 * { success, data } envelope. Thrown errors go to the error middleware.
 */
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { z } from 'zod';

export type InputPicker = (req: Request) => unknown;

export const fromQuery: InputPicker = req => req.query;
export const fromQueryAndParams: InputPicker = req => ({ ...req.query, ...req.params });

export function validationErrors(error: z.ZodError): string[] {
  return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

export function handle<S extends z.ZodTypeAny>(
  schema: S,
  pick: InputPicker,
  fn: (input: z.output<S>, req: Request, res: Response) => unknown,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(pick(req));
    if (!result.success) {
      res.status(400).json({ success: false, error: 'Validation failed', code: 'VALIDATION', details: validationErrors(result.error) });
      return;
    }
    Promise.resolve()
      .then(() => fn(result.data, req, res))
      .then(data => {
        if (!res.headersSent) res.json({ success: true, data });
      })
      .catch(next);
  };
}
