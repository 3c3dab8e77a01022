import { describe, it, expect, vi } from "vitest";
import { ToolCallBudget } from "../../src/core/Budget.js";
import { SiteAgent, extractJsonObject, type CodeRunner } from "../../src/llm/SiteAgent.js";
import type { AssistantMessage, ChatMessage } from "../../src/llm/OpenAICompatibleClient.js";
import { EventLog } from "../../src/observability/EventLog.js";
import { Metrics } from "../../src/observability/Metrics.js";
import type { SandboxResult } from "../../src/sandbox/SandboxExecutor.js";
import type { SearchProvider } from "../../src/search/WebSearch.js";
import type { ExistingArtifact } from "../../src/types/Artifact.js";
import {
  answerMessage,
  ScriptedChatClient,
  silentLogger,
  taskRequest,
  toolCallMessage,
} from "../fixtures/index.js";

const INDEX_ANSWER = { files: [{ path: "index.html", content: "<h1>Hello</h1>" }] };

function okRun(overrides: Partial<SandboxResult> = {}): SandboxResult {
  return { status: "ok", exitCode: 0, stdout: "", stderr: "", durationMs: 5, files: [], ...overrides };
}

function setup(script: AssistantMessage[], options: { maxSteps?: number; sandboxResult?: SandboxResult } = {}) {
  const llm = new ScriptedChatClient(script);
  const searchFn = vi.fn<SearchProvider["search"]>().mockImplementation(async (query) => ({
    query,
    summary: `About ${query}`,
    hits: [],
  }));
  const search: SearchProvider = { name: "fake", search: searchFn };
  const execute = vi.fn<CodeRunner["execute"]>().mockResolvedValue(options.sandboxResult ?? okRun());
  const events = new EventLog();
  const metrics = new Metrics();
  const agent = new SiteAgent(
    { llm, sandbox: { execute }, search, logger: silentLogger, events, metrics },
    { maxSteps: options.maxSteps },
  );
  return { agent, llm, searchFn, execute, events, metrics };
}

function toolMessage(messages: ChatMessage[], index: number): string {
  const message = messages[index];
  if (message?.role !== "tool") throw new Error(`message ${index} is not a tool message`);
  return message.content;
}

function userText(messages: ChatMessage[]): string {
  const user = messages[1];
  if (user?.role !== "user") throw new Error("second message is not the task prompt");
  if (typeof user.content === "string") return user.content;
  const first = user.content[0];
  return first?.type === "text" ? first.text : "";
}

describe("SiteAgent", () => {
  it("returns the files of a valid final answer", async () => {
    const { agent, llm } = setup([answerMessage(INDEX_ANSWER)]);

    const result = await agent.run({ jobId: "job-1", request: taskRequest(), budget: new ToolCallBudget() });

    expect(result).toEqual({
      artifacts: [{ path: "index.html", content: "<h1>Hello</h1>", message: "Add index.html" }],
      steps: 1,
    });
    expect(llm.calls[0]?.toolNames).toEqual(["web_search", "run_code"]);
    expect(llm.calls[0]?.options?.timeoutMs).toBe(120_000);
    const system = llm.calls[0]?.messages[0];
    expect(system?.role).toBe("system");
    expect(system?.content).toContain("- web_search: at most 1 call(s).");
    expect(system?.content).toContain("- run_code: at most 4 call(s).");
  });

  it("refuses a second search without calling the provider", async () => {
    const { agent, llm, searchFn, events, metrics } = setup([
      toolCallMessage([{ id: "s1", name: "web_search", args: { query: "hello world" } }]),
      toolCallMessage([{ id: "s2", name: "web_search", args: { query: "hello again" } }]),
      answerMessage(INDEX_ANSWER),
    ]);
    const budget = new ToolCallBudget({ search: 1 });

    await agent.run({ jobId: "job-1", request: taskRequest(), budget });

    expect(searchFn).toHaveBeenCalledTimes(1);
    expect(searchFn.mock.calls[0]?.[0]).toBe("hello world");
    expect(llm.calls[1]?.toolNames).toEqual(["run_code"]);

    const last = llm.calls[2]?.messages ?? [];
    expect(toolMessage(last, 3)).toBe(
      `Observation: ${JSON.stringify({ ok: true, result: { query: "hello world", summary: "About hello world", hits: [] } })}`,
    );
    expect(toolMessage(last, 5)).toBe(
      `Observation: ${JSON.stringify({
        ok: false,
        error: { kind: "BUDGET_EXCEEDED", message: "web_search call limit reached; continue with the information you have" },
      })}`,
    );
    expect(metrics.getCounter("tool_denied_total", { toolName: "web_search" })).toBe(1);
    expect(events.query({ type: "TOOL_DENIED" })).toHaveLength(1);
    expect(events.query({ type: "TOOL_CALLED" })).toHaveLength(1);
  });

  it("does not cache searches: a repeated query before the cap is a fresh call", async () => {
    const { agent, searchFn } = setup([
      toolCallMessage([{ id: "s1", name: "web_search", args: { query: "same" } }]),
      toolCallMessage([{ id: "s2", name: "web_search", args: { query: "same" } }]),
      answerMessage(INDEX_ANSWER),
    ]);

    await agent.run({ jobId: "job-1", request: taskRequest(), budget: new ToolCallBudget({ search: 2 }) });

    expect(searchFn).toHaveBeenCalledTimes(2);
  });

  it("refuses executions over the cap without touching the sandbox", async () => {
    const { agent, execute, llm } = setup([
      toolCallMessage([
        { id: "r1", name: "run_code", args: { code: "print(1)" } },
        { id: "r2", name: "run_code", args: { code: "print(2)" } },
      ]),
      answerMessage(INDEX_ANSWER),
    ]);
    const budget = new ToolCallBudget({ exec: 1 });

    await agent.run({ jobId: "job-1", request: taskRequest(), budget });

    expect(execute).toHaveBeenCalledTimes(1);
    expect(budget.snapshot().exec).toEqual({ used: 1, remaining: 0 });
    const messages = llm.calls[1]?.messages ?? [];
    expect(toolMessage(messages, 4)).toContain('"kind":"BUDGET_EXCEEDED"');
    expect(llm.calls[1]?.toolNames).toEqual(["web_search"]);
  });

  it("reports invalid arguments without charging the budget", async () => {
    const { agent, llm, execute, searchFn } = setup([
      toolCallMessage([
        { id: "r1", name: "run_code", args: { language: "python" } },
        { id: "s1", name: "web_search", args: "not json" },
        { id: "x1", name: "delete_repo", args: {} },
      ]),
      answerMessage(INDEX_ANSWER),
    ]);
    const budget = new ToolCallBudget();

    await agent.run({ jobId: "job-1", request: taskRequest(), budget });

    expect(execute).not.toHaveBeenCalled();
    expect(searchFn).not.toHaveBeenCalled();
    expect(budget.snapshot()).toEqual({ search: { used: 0, remaining: 1 }, exec: { used: 0, remaining: 4 } });
    const messages = llm.calls[1]?.messages ?? [];
    expect(toolMessage(messages, 3)).toBe(
      `Observation: ${JSON.stringify({
        ok: false,
        error: { kind: "INPUT_SCHEMA_INVALID", message: "Invalid arguments for run_code: / must have required property 'code'" },
      })}`,
    );
    expect(toolMessage(messages, 4)).toContain("Arguments for web_search are not valid JSON");
    expect(toolMessage(messages, 5)).toContain('Unknown tool \\"delete_repo\\"');
  });

  it("feeds a failing script back to the model and keeps going", async () => {
    const { agent, llm, execute } = setup(
      [
        toolCallMessage([{ id: "r1", name: "run_code", args: { code: "raise SystemExit(2)", dependencies: ["numpy"] } }]),
        answerMessage(INDEX_ANSWER),
      ],
      { sandboxResult: okRun({ status: "error", exitCode: 2, stderr: "Traceback" }) },
    );
    const request = taskRequest({ attachments: [{ name: "data.csv", url: "data:text/csv,a%2Cb" }] });

    const result = await agent.run({ jobId: "job-1", request, budget: new ToolCallBudget() });

    expect(result.artifacts).toHaveLength(1);
    expect(execute.mock.calls[0]?.[0]).toMatchObject({
      code: "raise SystemExit(2)",
      language: "python",
      dependencies: ["numpy"],
      attachments: [{ name: "data.csv", url: "data:text/csv,a%2Cb" }],
    });
    const observation = toolMessage(llm.calls[1]?.messages ?? [], 3);
    expect(observation).toBe(
      `Observation: ${JSON.stringify({
        ok: false,
        result: { status: "error", exitCode: 2, stdout: "", stderr: "Traceback", files: [] },
      })}`,
    );
  });

  it("reports a killed script as an observation and still finishes", async () => {
    const { agent, llm, execute } = setup(
      [
        toolCallMessage([{ id: "r1", name: "run_code", args: { code: "while True: pass" } }]),
        answerMessage(INDEX_ANSWER),
      ],
      {
        sandboxResult: okRun({
          status: "timeout",
          exitCode: null,
          skippedAttachments: [{ name: "notes.bin", reason: "unsupported" }],
          error: { kind: "EXECUTION_TIMEOUT", message: "script exceeded 10000ms and was killed" },
        }),
      },
    );
    const budget = new ToolCallBudget();

    const result = await agent.run({ jobId: "job-1", request: taskRequest(), budget });

    expect(execute).toHaveBeenCalledTimes(1);
    expect(result.artifacts.map((a) => a.path)).toEqual(["index.html"]);
    expect(toolMessage(llm.calls[1]?.messages ?? [], 3)).toBe(
      `Observation: ${JSON.stringify({
        ok: false,
        result: {
          status: "timeout",
          exitCode: null,
          stdout: "",
          stderr: "",
          files: [],
          skippedAttachments: [{ name: "notes.bin", reason: "unsupported" }],
        },
        error: { kind: "EXECUTION_TIMEOUT", message: "script exceeded 10000ms and was killed" },
      })}`,
    );
  });

  it("publishes files produced by run_code through sandboxOutputs", async () => {
    const png = Buffer.from([0x89, 0x50, 0x4e]);
    const { agent } = setup(
      [
        toolCallMessage([{ id: "r1", name: "run_code", args: { code: "make_chart()" } }]),
        answerMessage({
          files: [{ path: "index.html", content: '<img src="assets/chart.png">', message: "Add page" }],
          sandboxOutputs: [{ source: "chart.png", path: "assets/chart.png" }],
        }),
      ],
      { sandboxResult: okRun({ files: [{ path: "chart.png", bytes: 3, content: png }] }) },
    );

    const { artifacts } = await agent.run({ jobId: "job-1", request: taskRequest(), budget: new ToolCallBudget() });

    expect(artifacts).toEqual([
      { path: "index.html", content: '<img src="assets/chart.png">', message: "Add page" },
      { path: "assets/chart.png", content: png, message: "Add assets/chart.png" },
    ]);
  });

  it("sends a rejected answer back and accepts a fenced retry", async () => {
    const { agent, llm } = setup([
      answerMessage("Here is your site!"),
      answerMessage(`Sure:\n\`\`\`json\n${JSON.stringify(INDEX_ANSWER)}\n\`\`\``),
    ]);

    const result = await agent.run({ jobId: "job-1", request: taskRequest(), budget: new ToolCallBudget() });

    expect(result.steps).toBe(2);
    const messages = llm.calls[1]?.messages ?? [];
    expect(messages[messages.length - 1]).toEqual({
      role: "user",
      content: "Your answer was not accepted: no JSON object found. Reply with the JSON object only.",
    });
  });

  it("rejects sandbox outputs that were never produced", async () => {
    const { agent, llm } = setup([
      answerMessage({ sandboxOutputs: [{ source: "ghost.png" }] }),
      answerMessage(INDEX_ANSWER),
    ]);

    await agent.run({ jobId: "job-1", request: taskRequest(), budget: new ToolCallBudget() });

    const messages = llm.calls[1]?.messages ?? [];
    expect(messages[messages.length - 1]?.content).toBe(
      'Your answer was not accepted: sandbox output "ghost.png" was not produced by run_code. Reply with the JSON object only.',
    );
  });

  it("raises a generation error when no usable answer arrives", async () => {
    const escape = answerMessage({ files: [{ path: "../escape.html", content: "x" }] });
    const { agent } = setup([escape, escape], { maxSteps: 2 });

    await expect(
      agent.run({ jobId: "job-1", request: taskRequest(), budget: new ToolCallBudget() }),
    ).rejects.toMatchObject({ kind: "GENERATION_ERROR", message: "No usable site files after 2 model turn(s)" });
  });

  it("rejects an answer without files", async () => {
    const { agent } = setup([answerMessage({ files: [] })], { maxSteps: 1 });

    await expect(
      agent.run({ jobId: "job-1", request: taskRequest(), budget: new ToolCallBudget() }),
    ).rejects.toMatchObject({ kind: "GENERATION_ERROR" });
  });

  it("sends images as image parts and inlines text attachments", async () => {
    const { agent, llm } = setup([answerMessage(INDEX_ANSWER)]);
    const request = taskRequest({
      attachments: [
        { name: "logo.png", url: "data:image/png;base64,iVBORw0K" },
        { name: "notes.txt", url: "data:text/plain,hello%20notes" },
        { name: "broken.txt", url: "https://example.com/broken.txt" },
      ],
    });

    await agent.run({ jobId: "job-1", request, budget: new ToolCallBudget() });

    const user = llm.calls[0]?.messages[1];
    expect(user?.role).toBe("user");
    expect(Array.isArray(user?.content)).toBe(true);
    if (user?.role === "user" && Array.isArray(user.content)) {
      expect(user.content[1]).toEqual({ type: "image_url", image_url: { url: "data:image/png;base64,iVBORw0K" } });
    }
    const prompt = userText(llm.calls[0]?.messages ?? []);
    expect(prompt).toContain("----- attachment notes.txt -----\nhello notes\n");
    expect(prompt).toContain("----- attachments sent to you as images -----\nlogo.png\n");
    expect(prompt).toContain(
      '----- attachments that could not be decoded -----\nbroken.txt: Attachment "broken.txt": only data: URIs are supported\n',
    );
  });

  it("shows existing files on update rounds", async () => {
    const { agent, llm } = setup([answerMessage(INDEX_ANSWER)]);
    const existing: ExistingArtifact[] = [
      { path: "index.html", bytes: 11, text: "<h1>v1</h1>" },
      { path: "logo.png", bytes: 2048 },
    ];

    await agent.run({ jobId: "job-2", request: taskRequest({ round: 2 }), budget: new ToolCallBudget(), existing });

    const prompt = userText(llm.calls[0]?.messages ?? []);
    expect(prompt).toContain("=== index.html ===\n<h1>v1</h1>\n");
    expect(prompt).toContain("=== logo.png (2048 bytes, not shown) ===");
  });

  it("stops when the job signal is already aborted", async () => {
    const { agent, llm } = setup([answerMessage(INDEX_ANSWER)]);
    const controller = new AbortController();
    controller.abort();

    await expect(
      agent.run({ jobId: "job-1", request: taskRequest(), budget: new ToolCallBudget(), signal: controller.signal }),
    ).rejects.toMatchObject({ kind: "DEADLINE_EXCEEDED" });
    expect(llm.calls).toHaveLength(0);
  });
});

describe("extractJsonObject", () => {
  it("finds the object inside prose or fences", () => {
    expect(extractJsonObject('Result: {"a":1} done')).toBe('{"a":1}');
    expect(extractJsonObject('```json\n{"b":2}\n```')).toBe('{"b":2}');
    expect(extractJsonObject("no braces")).toBeUndefined();
  });
});
