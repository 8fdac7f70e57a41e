import { describe, test, expect, vi } from "vitest";
import { ToolLoopController } from "../../src/loop/controller.js";
import { resumeBlockedState } from "../../src/loop/resume.js";
import { Role } from "../../src/types/role.js";
import { ContentKind } from "../../src/types/content-part.js";
import type { Message } from "../../src/types/message.js";
import {
  messageText,
  messageToolCalls,
  messageToolResults,
  userMessage,
} from "../../src/types/message.js";
import type { ToolDefinition, ToolHandlers } from "../../src/types/tool.js";
import {
  CancelledError,
  ConfigurationError,
  MaxStepsExceededError,
  ProviderError,
  ToolApprovalRequiredError,
} from "../../src/types/errors.js";
import { CancellationTokenSource } from "../../src/utils/cancellation.js";
import { StubSource, call, textResponse, toolCallResponse } from "../stubs/stub-source.js";

const addTool: ToolDefinition = {
  name: "add",
  description: "Add two numbers",
  parameters: {
    type: "object",
    properties: { a: { type: "number" }, b: { type: "number" } },
    required: ["a", "b"],
  },
};

const handlers: ToolHandlers = {
  add: {
    parseArguments: true,
    execute: (args) => Number(args["a"]) + Number(args["b"]),
  },
};

const seed: Message[] = [userMessage("What is 1 + 2?")];

describe("ToolLoopController", () => {
  test("finishes in one step when no tools are requested", async () => {
    const source = new StubSource("stub", [{ response: textResponse("Hi there") }]);
    const result = await new ToolLoopController({ source, messages: seed }).run();

    expect(result.text).toBe("Hi there");
    expect(result.steps).toHaveLength(1);
    expect(result.messages).toHaveLength(2);
    expect(result.messages[1]?.role).toBe(Role.ASSISTANT);
    expect(messageText(result.messages[1] ?? userMessage(""))).toBe("Hi there");
    expect(result.usage).toEqual({ inputTokens: 10, outputTokens: 5, totalTokens: 15 });
    expect(source.callCount).toBe(1);
  });

  test("executes tools and feeds results back", async () => {
    const source = new StubSource("stub", [
      { response: toolCallResponse([call("1", "add", { a: 1, b: 2 })]) },
      { response: textResponse("The answer is 3") },
    ]);
    const result = await new ToolLoopController({
      source,
      messages: seed,
      tools: [addTool],
      toolHandlers: handlers,
    }).run();

    expect(result.text).toBe("The answer is 3");
    expect(result.messages.map((m) => m.role)).toEqual([
      Role.USER,
      Role.ASSISTANT,
      Role.USER,
      Role.ASSISTANT,
    ]);
    expect(result.steps.map((s) => s.stepIndex)).toEqual([0, 1]);
    expect(result.steps[0]?.toolResults).toEqual([
      { toolCallId: "1", toolName: "add", content: "3", isError: false },
    ]);
    expect(result.usage).toEqual({
      inputTokens: 20,
      outputTokens: 10,
      totalTokens: 30,
      reasoningTokens: undefined,
    });

    const second = source.calls[1];
    expect(second?.messages).toHaveLength(3);
    expect(second?.tools).toEqual([addTool]);
  });

  test("does not mutate the seed history", async () => {
    const messages = [...seed];
    const source = new StubSource("stub", [{ response: textResponse("ok") }]);
    await new ToolLoopController({ source, messages }).run();
    expect(messages).toHaveLength(1);
  });

  test("a failing handler yields an error result and the loop continues", async () => {
    const source = new StubSource("stub", [
      { response: toolCallResponse([call("1", "flaky"), call("2", "add", { a: 2, b: 2 })]) },
      { response: textResponse("done") },
    ]);
    const result = await new ToolLoopController({
      source,
      messages: seed,
      toolHandlers: {
        ...handlers,
        flaky: () => {
          throw new Error("disk full");
        },
      },
    }).run();

    expect(result.text).toBe("done");
    const resultsMessage = source.calls[1]?.messages[2];
    expect(resultsMessage?.role).toBe(Role.USER);
    expect(messageToolResults(resultsMessage ?? userMessage(""))).toEqual([
      { toolCallId: "1", toolName: "flaky", content: '{"error":"disk full"}', isError: true },
      { toolCallId: "2", toolName: "add", content: "4", isError: false },
    ]);
  });

  test("unknown tools are reported back to the model", async () => {
    const source = new StubSource("stub", [
      { response: toolCallResponse([call("1", "nope")]) },
      { response: textResponse("sorry") },
    ]);
    const result = await new ToolLoopController({ source, messages: seed }).run();
    expect(result.steps[0]?.toolResults[0]?.content).toBe('{"error":"Unknown function: nope"}');
  });

  test("stops after maxSteps without calling the source again", async () => {
    const source = new StubSource("stub", [
      { response: toolCallResponse([call("1", "add", { a: 1, b: 1 })]) },
      { response: toolCallResponse([call("2", "add", { a: 1, b: 1 })]) },
      { response: textResponse("never reached") },
    ]);
    const run = new ToolLoopController({
      source,
      messages: seed,
      toolHandlers: handlers,
      maxSteps: 2,
    }).run();

    await expect(run).rejects.toThrow(
      "Tool loop exceeded maxSteps (2). The model kept requesting tools and did not produce a final response.",
    );
    const error = await run.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(MaxStepsExceededError);
    if (error instanceof MaxStepsExceededError) {
      expect(error.steps).toHaveLength(2);
      expect(error.messages).toHaveLength(5);
    }
    expect(source.callCount).toBe(2);
  });

  test("rejects maxSteps below one", () => {
    const source = new StubSource("stub", []);
    expect(() => new ToolLoopController({ source, messages: seed, maxSteps: 0 })).toThrow(
      ConfigurationError,
    );
  });

  test("rejects invalid tool definitions up front", () => {
    const source = new StubSource("stub", []);
    expect(
      () =>
        new ToolLoopController({
          source,
          messages: seed,
          tools: [{ name: "bad name", description: "", parameters: { type: "object" } }],
        }),
    ).toThrow('Invalid tool name "bad name"');
  });

  test("persists the source's assistant message verbatim", async () => {
    const verbatim: Message = {
      role: Role.ASSISTANT,
      content: [
        { kind: ContentKind.TEXT, text: "Let me add that." },
        { kind: ContentKind.TOOL_USE, toolCall: call("1", "add", { a: 1, b: 2 }) },
      ],
      extensions: new Map([["signature", "sig-abc"]]),
    };
    const source = new StubSource("stub", [
      { response: toolCallResponse([call("1", "add", { a: 1, b: 2 })], { assistantMessage: verbatim }) },
      { response: textResponse("3") },
    ]);
    const result = await new ToolLoopController({
      source,
      messages: seed,
      toolHandlers: handlers,
    }).run();

    expect(result.messages[1]).toBe(verbatim);
    expect(source.calls[1]?.messages[1]?.extensions?.get("signature")).toBe("sig-abc");
  });

  test("builds the tool-use message from text and calls", async () => {
    const source = new StubSource("stub", [
      { response: toolCallResponse([call("1", "add", { a: 1, b: 2 })], { text: "Adding" }) },
      { response: textResponse("3") },
    ]);
    const result = await new ToolLoopController({
      source,
      messages: seed,
      toolHandlers: handlers,
    }).run();

    const toolUse = result.messages[1] ?? userMessage("");
    expect(toolUse.content.map((p) => p.kind)).toEqual([ContentKind.TEXT, ContentKind.TOOL_USE]);
    expect(messageToolCalls(toolUse)).toEqual([call("1", "add", { a: 1, b: 2 })]);
  });

  test("wraps source failures in ProviderError", async () => {
    const cause = new Error("socket closed");
    const source = new StubSource("stub", [{ error: cause }]);
    const error = await new ToolLoopController({ source, messages: seed })
      .run()
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    if (error instanceof ProviderError) {
      expect(error.message).toBe('Event source "stub" failed: socket closed');
      expect(error.cause).toBe(cause);
      expect(error.source).toBe("stub");
      expect(error.messages).toEqual(seed);
    }
  });

  test("throws before calling the source when already cancelled", async () => {
    const cancel = new CancellationTokenSource();
    cancel.cancel("user");
    const source = new StubSource("stub", [{ response: textResponse("x") }]);
    await expect(
      new ToolLoopController({ source, messages: seed, cancelToken: cancel.token }).run(),
    ).rejects.toBeInstanceOf(CancelledError);
    expect(source.callCount).toBe(0);
  });

  test("cancellation during tool execution stops the loop", async () => {
    const cancel = new CancellationTokenSource();
    const source = new StubSource("stub", [
      { response: toolCallResponse([call("1", "slow")]) },
      { response: textResponse("never") },
    ]);
    const run = new ToolLoopController({
      source,
      messages: seed,
      cancelToken: cancel.token,
      toolHandlers: {
        slow: () => {
          cancel.cancel("user");
          throw new Error("aborted");
        },
      },
    }).run();

    await expect(run).rejects.toThrow("Operation cancelled: user");
    expect(source.callCount).toBe(1);
  });

  test("can only run once", async () => {
    const source = new StubSource("stub", [{ response: textResponse("one") }]);
    const controller = new ToolLoopController({ source, messages: seed });
    await controller.run();
    await expect(controller.run()).rejects.toThrow("ToolLoopController can only be run once");
  });

  test("runs tools sequentially when configured", async () => {
    const order: string[] = [];
    const record = (label: string) => async () => {
      order.push(`start ${label}`);
      await new Promise((resolve) => setTimeout(resolve, 5));
      order.push(`end ${label}`);
      return label;
    };
    const source = new StubSource("stub", [
      { response: toolCallResponse([call("1", "a"), call("2", "b")]) },
      { response: textResponse("done") },
    ]);
    await new ToolLoopController({
      source,
      messages: seed,
      toolExecution: "sequential",
      toolHandlers: { a: record("a"), b: record("b") },
    }).run();
    expect(order).toEqual(["start a", "end a", "start b", "end b"]);
  });
});

describe("approval", () => {
  const rmTool = call("1", "rm", { path: "/tmp/x" });

  function gatedSource(): StubSource {
    return new StubSource("stub", [
      { response: toolCallResponse([rmTool, call("2", "add", { a: 1, b: 2 })]) },
      { response: textResponse("Removed") },
    ]);
  }

  test("blocks before executing any call of the step", async () => {
    const rm = vi.fn(() => "removed");
    const source = gatedSource();
    const outcome = await new ToolLoopController({
      source,
      messages: seed,
      toolHandlers: { ...handlers, rm },
      toolApprovalChecks: { rm: () => true },
    }).runUntilBlocked();

    expect(outcome.status).toBe("blocked");
    if (outcome.status !== "blocked") return;
    const { state } = outcome;
    expect(state.toolCallsNeedingApproval.map((c) => c.id)).toEqual(["1"]);
    expect(state.pendingToolCalls.map((c) => c.id)).toEqual(["1", "2"]);
    expect(state.stepIndex).toBe(0);
    expect(state.messages).toHaveLength(2);
    const last = state.messages[1] ?? userMessage("");
    expect(last.role).toBe(Role.ASSISTANT);
    expect(messageToolCalls(last).map((c) => c.id)).toEqual(["1", "2"]);
    expect(messageToolResults(last)).toEqual([]);
    expect(rm).not.toHaveBeenCalled();
    expect(source.callCount).toBe(1);
  });

  test("the state snapshot reports the calls awaiting approval", async () => {
    const controller = new ToolLoopController({
      source: gatedSource(),
      messages: seed,
      toolHandlers: handlers,
      toolApprovalChecks: { rm: () => true },
    });
    expect(controller.state.toolCallsNeedingApproval).toEqual([]);

    const outcome = await controller.runUntilBlocked();
    expect(outcome.status).toBe("blocked");
    expect(controller.state.toolCallsNeedingApproval).toEqual([rmTool]);
    expect(controller.state.pendingToolCalls.map((c) => c.id)).toEqual(["1", "2"]);
    expect(controller.state.messages).toHaveLength(2);
  });

  test("run() throws ToolApprovalRequiredError", async () => {
    const error = await new ToolLoopController({
      source: gatedSource(),
      messages: seed,
      toolHandlers: handlers,
      needsApproval: (c) => c.function.name === "rm",
    })
      .run()
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolApprovalRequiredError);
    if (error instanceof ToolApprovalRequiredError) {
      expect(error.message).toBe("Tool approval required: rm");
      expect(error.state.toolCallsNeedingApproval).toEqual([rmTool]);
    }
  });

  test("resuming after approval reaches the same answer as an ungated run", async () => {
    const rm = () => "removed";
    const ungated = await new ToolLoopController({
      source: gatedSource(),
      messages: seed,
      toolHandlers: { ...handlers, rm },
    }).run();

    const outcome = await new ToolLoopController({
      source: gatedSource(),
      messages: seed,
      toolHandlers: { ...handlers, rm },
      toolApprovalChecks: { rm: () => true },
    }).runUntilBlocked();
    if (outcome.status !== "blocked") throw new Error("expected a blocked outcome");

    const resumedHistory = await resumeBlockedState(outcome.state, { ...handlers, rm }, { "1": true });
    const resumedSource = new StubSource("stub", [{ response: textResponse("Removed") }]);
    const resumed = await new ToolLoopController({
      source: resumedSource,
      messages: resumedHistory,
      toolHandlers: { ...handlers, rm },
    }).run();

    expect(resumed.text).toBe(ungated.text);
    expect(resumed.messages).toEqual(ungated.messages);
    expect(resumed.steps[0]?.stepIndex).toBe(0);
  });
});
