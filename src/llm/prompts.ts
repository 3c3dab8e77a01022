import type { ToolCallLimits } from "../core/Budget.js";
import type { ExistingArtifact } from "../types/Artifact.js";
import type { TaskRequest } from "../types/TaskRequest.js";

/** Caps on what is inlined into the prompt. */
const MAX_INLINE_TEXT = 20_000;
const MAX_EXISTING_TEXT_TOTAL = 60_000;

export function buildSystemPrompt(limits: ToolCallLimits): string {
  return [
    "You build static web sites that are served from the root of a GitHub Pages repository.",
    "Return only the files the site needs (for example index.html, style.css, script.js) and every file the checks refer to.",
    "Paths are relative to the repository root.",
    "",
    "Tools:",
    `- web_search: at most ${limits.search} call(s). Use it only when the brief needs facts you do not have.`,
    `- run_code: at most ${limits.exec} call(s). Use it to inspect attachments you cannot read directly, or to generate binary assets such as charts.`,
    "  If a run fails, read stderr and either fix the script or continue without it.",
    "Calls over the limit are refused. After that, work with what you already have.",
    "",
    "When you are done, reply with ONLY a JSON object, no prose:",
    '{"files":[{"path":"index.html","content":"...","message":"Add index page"}],',
    ' "sandboxOutputs":[{"source":"chart.png","path":"assets/chart.png","message":"Add chart"}]}',
    "`sandboxOutputs` publishes a file created by your last run_code call that produced it.",
    "Make sure every check passes; you are evaluated on the checks.",
  ].join("\n");
}

export interface PromptAttachments {
  /** Names sent to you as images */
  images: string[];
  /** Text attachments inlined below */
  texts: Array<{ name: string; text: string }>;
  /** Every attachment available to run_code */
  all: string[];
  /** Attachments that could not be decoded, with the reason */
  invalid: Array<{ name: string; reason: string }>;
}

function section(title: string, body: string): string {
  return `----- ${title} -----\n${body}\n`;
}

function clip(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}\n[... truncated ${text.length - max} characters]` : text;
}

export function buildTaskPrompt(
  request: TaskRequest,
  attachments: PromptAttachments,
  existing: ExistingArtifact[],
): string {
  const parts: string[] = [
    section("task", request.task),
    section("round", String(request.round)),
    section("brief", request.brief || "(none)"),
    section("checks", request.checks.length ? request.checks.map((c) => `- ${c}`).join("\n") : "(none)"),
  ];

  if (attachments.all.length > 0) {
    parts.push(section("attachments available to run_code", attachments.all.join("\n")));
  }
  if (attachments.images.length > 0) {
    parts.push(section("attachments sent to you as images", attachments.images.join("\n")));
  }
  for (const { name, text } of attachments.texts) {
    parts.push(section(`attachment ${name}`, clip(text, MAX_INLINE_TEXT)));
  }
  if (attachments.invalid.length > 0) {
    parts.push(
      section(
        "attachments that could not be decoded",
        attachments.invalid.map((a) => `${a.name}: ${a.reason}`).join("\n"),
      ),
    );
  }

  if (request.round > 1) {
    parts.push(renderExisting(existing));
  }

  return parts.join("\n");
}

/**
 * Existing site for update rounds. Text files are shown in full up to a
 * total cap; the rest are listed by path and size.
 */
function renderExisting(existing: ExistingArtifact[]): string {
  const lines = [
    "This is an update. The repository already contains the files below.",
    "Keep them unless the brief asks to replace them. Return only files you add or change;",
    "files you do not return stay as they are.",
    "",
  ];
  let budget = MAX_EXISTING_TEXT_TOTAL;
  for (const file of existing) {
    if (file.text !== undefined && file.text.length <= budget) {
      budget -= file.text.length;
      lines.push(`=== ${file.path} ===`, file.text, "");
    } else {
      lines.push(`=== ${file.path} (${file.bytes} bytes, not shown) ===`, "");
    }
  }
  if (existing.length === 0) lines.push("(no files found)");
  return section("existing files", lines.join("\n"));
}
