import { SchemaValidator } from "../core/SchemaValidator.js";
import type { TaskSubmission } from "../types/TaskRequest.js";

/**
 * JSON Schema for the `POST /task` body.
 */
export const TASK_SUBMISSION_SCHEMA = {
  type: "object",
  properties: {
    email: { type: "string", format: "email" },
    secret: { type: "string" },
    task: { type: "string", minLength: 1, maxLength: 200 },
    round: { type: "integer", minimum: 1 },
    evaluation_url: { type: "string", format: "uri" },
    nonce: { type: "string" },
    brief: { type: "string" },
    checks: {
      type: ["array", "string"],
      items: { type: "string" },
    },
    attachments: {
      type: "array",
      items: {
        type: "object",
        properties: {
          name: { type: "string", minLength: 1 },
          url: { type: "string", minLength: 1 },
        },
        required: ["name", "url"],
      },
    },
  },
  required: ["email", "secret", "task", "round", "evaluation_url"],
};

export type SubmissionCheck =
  | { ok: true; submission: TaskSubmission }
  | { ok: false; errors: string[] };

const validator = new SchemaValidator();
const validateSubmission = validator.compile<TaskSubmission>(TASK_SUBMISSION_SCHEMA);

/**
 * Validate a request body. Numeric strings are coerced (`"2"` → 2).
 */
export function checkSubmission(body: unknown): SubmissionCheck {
  const result = validator.validate(validateSubmission, body);
  if (result.valid && result.data) {
    return { ok: true, submission: result.data };
  }
  const errors = result.errors ?? [];
  const messages = errors.map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`);
  return { ok: false, errors: messages.length > 0 ? messages : ["body is invalid"] };
}
