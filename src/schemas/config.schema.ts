export const configSchema = {
  $schema: "https://json-schema.org/draft/2020-12/schema",
  type: "object",
  additionalProperties: false,
  properties: {
    driver: { type: "string", minLength: 1 },
    consoleDriver: { type: "string", minLength: 1 },
    user: { type: "string", minLength: 1 },
    port: { type: "integer", minimum: 1, maximum: 65535 },
    timeout: { type: "integer", minimum: 0 },
    logfile: { type: "string", minLength: 1 },
    ignoreWarnings: { type: "array", items: { type: "string" } }
  }
} as const
