import type { ZodTypeAny } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

export function toJsonSchema(schema: ZodTypeAny, title?: string) {
  const { $schema, definitions, ...jsonSchema } = zodToJsonSchema(schema, {
    $refStrategy: 'none',
    target: 'openApi3',
  });
  return title ? { title, ...jsonSchema } : jsonSchema;
}
