import * as z from "zod";

/**
 * Converts a tool's zod schema into the JSON Schema sent to the model.
 * Uses the input side of the schema, so fields with defaults stay optional.
 * The `$schema` marker is dropped; function-calling APIs do not accept it.
 *
 * @example
 * ```typescript
 * schemaToJSONSchema(z.object({ city: z.string().describe("City name") }));
 * // { type: "object", properties: { city: { type: "string", description: "City name" } }, ... }
 * ```
 */
export function schemaToJSONSchema(schema: z.ZodType): Record<string, unknown> {
  const { $schema: _ignored, ...jsonSchema } = z.toJSONSchema(schema, {
    target: "draft-7",
    io: "input",
  });
  return jsonSchema;
}
