import type { z } from "zod";

export interface EntrypointContext<TInput> {
  key: string;
  input: TInput;
  headers: Headers;
}

export interface EntrypointResult {
  output: unknown;
  status?: 200 | 400 | 409 | 500;
  headers?: Record<string, string>;
}

export interface EntrypointDef<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
  key: string;
  description: string;
  input: TSchema;
  handler(ctx: EntrypointContext<z.infer<TSchema>>): Promise<EntrypointResult>;
}
