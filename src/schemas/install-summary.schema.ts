export const installSummarySchema = {
  $schema: "https://json-schema.org/draft/2020-12/schema",
  type: "object",
  additionalProperties: true,
  required: ["action", "host", "transport", "changed", "checkMode", "durationMs", "final"],
  properties: {
    action: { const: "install" },
    host: { type: "string" },
    transport: { enum: ["rpc", "console"] },
    changed: { type: "boolean" },
    checkMode: { type: "boolean" },
    diff: { type: "string" },
    error: {
      type: "object",
      required: ["kind", "message"],
      properties: {
        kind: {
          enum: ["validation_error", "connect_error", "lock_error", "load_error", "check_error", "commit_error", "unlock_error", "console_error", "diff_sink_error"]
        },
        message: { type: "string" },
        remedy: { type: "string" }
      }
    },
    durationMs: { type: "number" },
    final: { const: true }
  }
} as const
