/**
 * AJV JSON Schema for validating LlmSqlPlan from the model.
 * Using plain object schema (not JSONSchemaType) to avoid complex union type issues.
 */

export const llmSqlPlanSchema = {
  type: 'object' as const,
  properties: {
    sql: { type: 'string' as const, minLength: 1 },
    params: {
      type: 'array' as const,
      items: {
        type: 'object' as const,
        properties: {
          name: { type: 'string' as const },
          type: { type: 'string' as const, enum: ['string', 'number', 'boolean', 'date', 'timestamp', 'null'] },
          value: {
            oneOf: [
              { type: 'string' as const },
              { type: 'number' as const },
              { type: 'boolean' as const },
              { type: 'null' as const },
            ],
          },
        },
        required: ['name', 'type', 'value'] as const,
        additionalProperties: false,
      },
    },
    assumptions: {
      type: 'array' as const,
      items: { type: 'string' as const },
    },
    confidence: { type: 'number' as const, minimum: 0, maximum: 1 },
  },
  required: ['sql', 'params', 'assumptions', 'confidence'] as const,
  additionalProperties: false,
};
