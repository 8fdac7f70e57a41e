import { describe, test, expect } from "vitest";
import {
  resumeToolLoop,
  runToolLoop,
  runToolLoopUntilBlocked,
  streamToolLoop,
} from "../../src/api/tool-loop.js";
import { userMessage } from "../../src/types/message.js";
import type { StreamPart } from "../../src/types/stream-part.js";
import { StreamPartType } from "../../src/types/stream-part.js";
import { StreamEventType } from "../../src/types/stream-event.js";
import type { ToolHandlers } from "../../src/types/tool.js";
import {
  CancelledError,
  MaxStepsExceededError,
  ProviderError,
  ToolApprovalRequiredError,
} from "../../src/types/errors.js";
import { CancellationTokenSource } from "../../src/utils/cancellation.js";
import {
  StubPartsSource,
  StubSource,
  call,
  collect,
  completion,
  textDelta,
  textResponse,
  thinkingDelta,
  toolCallDelta,
  toolCallResponse,
} from "../stubs/stub-source.js";

const messages = [userMessage("What is 1 + 2?")];

const handlers: ToolHandlers = {
  add: {
    parseArguments: true,
    execute: (args) => Number(args["a"]) + Number(args["b"]),
  },
};

function types(parts: StreamPart[]): string[] {
  return parts.map((p) => p.type);
}

function lastPart(parts: StreamPart[]): StreamPart | undefined {
  return parts[parts.length - 1];
}

describe("runToolLoop", () => {
  test("returns the final text", async () => {
    const source = new StubSource("stub", [
      { response: toolCallResponse([call("1", "add", { a: 1, b: 2 })]) },
      { response: textResponse("3") },
    ]);
    const result = await runToolLoop({ source, messages, toolHandlers: handlers });
    expect(result.text).toBe("3");
  });
});

describe("resumeToolLoop", () => {
  test("continues a blocked loop to completion", async () => {
    const source = new StubSource("stub", [
      { response: toolCallResponse([call("1", "add", { a: 1, b: 2 })]) },
      { response: textResponse("3") },
    ]);
    const options = {
      source,
      messages,
      toolHandlers: handlers,
      needsApproval: () => true,
    };
    const blocked = await runToolLoopUntilBlocked(options);
    if (blocked.status !== "blocked") throw new Error("expected a blocked outcome");

    const resumed = await resumeToolLoop({
      ...options,
      needsApproval: undefined,
      state: blocked.state,
      decisions: { "1": true },
    });
    expect(resumed.status).toBe("finished");
    if (resumed.status === "finished") {
      expect(resumed.result.text).toBe("3");
      expect(resumed.result.messages).toHaveLength(4);
    }
    expect(source.callCount).toBe(2);
  });

  test("blocks again when the next step also needs approval", async () => {
    const source = new StubSource("stub", [
      { response: toolCallResponse([call("1", "add", { a: 1, b: 2 })]) },
      { response: toolCallResponse([call("2", "add", { a: 3, b: 4 })]) },
    ]);
    const options = { source, messages, toolHandlers: handlers, needsApproval: () => true };
    const blocked = await runToolLoopUntilBlocked(options);
    if (blocked.status !== "blocked") throw new Error("expected a blocked outcome");

    const again = await resumeToolLoop({ ...options, state: blocked.state, decisions: { "1": true } });
    expect(again.status).toBe("blocked");
    if (again.status === "blocked") {
      expect(again.state.toolCallsNeedingApproval.map((c) => c.id)).toEqual(["2"]);
      expect(again.state.stepIndex).toBe(0);
    }
  });
});

describe("streamToolLoop", () => {
  test("streams a text answer as one block and a single finish", async () => {
    const source = new StubSource("stub", [
      {
        events: [
          textDelta("Hel"),
          textDelta("lo"),
          completion(textResponse("Hello", { providerMetadata: { id: "resp_1" } })),
        ],
      },
    ]);
    const parts = await collect(streamToolLoop({ source, messages }));
    expect(parts).toEqual([
      { type: StreamPartType.TEXT_START },
      { type: StreamPartType.TEXT_DELTA, delta: "Hel" },
      { type: StreamPartType.TEXT_DELTA, delta: "lo" },
      { type: StreamPartType.TEXT_END, text: "Hello" },
      { type: StreamPartType.PROVIDER_METADATA, metadata: { id: "resp_1" } },
      {
        type: StreamPartType.FINISH,
        response: {
          ...textResponse("Hello", { providerMetadata: { id: "resp_1" } }),
          thinking: undefined,
        },
      },
    ]);
  });

  test("streams tool calls, results and the final answer", async () => {
    const source = new StubSource("stub", [
      {
        events: [
          thinkingDelta("need math"),
          toolCallDelta("1", "add", '{"a":1,'),
          toolCallDelta("1", "", '"b":2}'),
          completion(toolCallResponse([])),
        ],
      },
      { response: textResponse("3") },
    ]);
    const parts = await collect(streamToolLoop({ source, messages, toolHandlers: handlers }));
    expect(types(parts)).toEqual([
      StreamPartType.REASONING_START,
      StreamPartType.REASONING_DELTA,
      StreamPartType.REASONING_END,
      StreamPartType.TOOL_CALL_START,
      StreamPartType.TOOL_CALL_DELTA,
      StreamPartType.TOOL_CALL_DELTA,
      StreamPartType.TOOL_CALL_END,
      StreamPartType.TOOL_RESULT,
      StreamPartType.FINISH,
    ]);
    expect(parts[6]).toEqual({
      type: StreamPartType.TOOL_CALL_END,
      toolCallId: "1",
      toolCall: call("1", "add", { a: 1, b: 2 }),
    });
    expect(parts[7]).toEqual({
      type: StreamPartType.TOOL_RESULT,
      result: { toolCallId: "1", toolName: "add", content: "3", isError: false },
    });
    const finish = lastPart(parts);
    expect(finish?.type === StreamPartType.FINISH ? finish.response.text : undefined).toBe("3");

    const secondRequest = source.calls[1];
    expect(secondRequest?.messages).toHaveLength(3);
  });

  test("emits only one provider metadata part per step", async () => {
    const source = new StubSource("stub", [
      {
        events: [
          toolCallDelta("1", "add", '{"a":1,"b":1}'),
          completion(toolCallResponse([], { providerMetadata: { id: "r1" } })),
        ],
      },
      {
        events: [
          textDelta("2"),
          completion(textResponse("2", { providerMetadata: { id: "r2" } })),
        ],
      },
    ]);
    const parts = await collect(streamToolLoop({ source, messages, toolHandlers: handlers }));
    const metadata = parts.filter((p) => p.type === StreamPartType.PROVIDER_METADATA);
    expect(metadata).toEqual([
      { type: StreamPartType.PROVIDER_METADATA, metadata: { id: "r1" } },
      { type: StreamPartType.PROVIDER_METADATA, metadata: { id: "r2" } },
    ]);
    expect(parts.filter((p) => p.type === StreamPartType.FINISH)).toHaveLength(1);
  });

  test("ends with an approval error instead of finish when blocked", async () => {
    const source = new StubSource("stub", [
      { response: toolCallResponse([call("1", "add", { a: 1, b: 2 })]) },
    ]);
    const parts = await collect(
      streamToolLoop({ source, messages, toolHandlers: handlers, needsApproval: () => true }),
    );
    expect(types(parts)).toEqual([
      StreamPartType.TOOL_CALL_START,
      StreamPartType.TOOL_CALL_END,
      StreamPartType.ERROR,
    ]);
    const last = lastPart(parts);
    expect(last?.type === StreamPartType.ERROR ? last.error : undefined).toBeInstanceOf(
      ToolApprovalRequiredError,
    );
  });

  test("ends with an error part when the source fails", async () => {
    const source = new StubSource("stub", [
      { events: [textDelta("par"), { type: StreamEventType.ERROR, error: new Error("overloaded") }] },
    ]);
    const parts = await collect(streamToolLoop({ source, messages }));
    expect(types(parts)).toEqual([
      StreamPartType.TEXT_START,
      StreamPartType.TEXT_DELTA,
      StreamPartType.TEXT_END,
      StreamPartType.ERROR,
    ]);
    const last = lastPart(parts);
    const error = last?.type === StreamPartType.ERROR ? last.error : undefined;
    expect(error).toBeInstanceOf(ProviderError);
    expect(error?.message).toBe('Event source "stub" failed: overloaded');
  });

  test("ends with MaxStepsExceededError when the model keeps calling tools", async () => {
    const source = new StubSource("stub", [
      { response: toolCallResponse([call("1", "add", { a: 1, b: 1 })]) },
      { response: toolCallResponse([call("2", "add", { a: 1, b: 1 })]) },
    ]);
    const parts = await collect(
      streamToolLoop({ source, messages, toolHandlers: handlers, maxSteps: 1 }),
    );
    const last = lastPart(parts);
    expect(last?.type === StreamPartType.ERROR ? last.error : undefined).toBeInstanceOf(
      MaxStepsExceededError,
    );
    expect(source.callCount).toBe(1);
  });

  test("closes the open block and ends with a cancellation error", async () => {
    const cancel = new CancellationTokenSource();
    const source = new StubSource("stub", [
      { events: [textDelta("one"), textDelta("two"), completion(textResponse("onetwo"))] },
    ]);
    const parts: StreamPart[] = [];
    for await (const part of streamToolLoop({ source, messages, cancelToken: cancel.token })) {
      parts.push(part);
      if (part.type === StreamPartType.TEXT_DELTA) cancel.cancel("user");
    }
    expect(parts.slice(0, 3)).toEqual([
      { type: StreamPartType.TEXT_START },
      { type: StreamPartType.TEXT_DELTA, delta: "one" },
      { type: StreamPartType.TEXT_END, text: "one" },
    ]);
    const last = lastPart(parts);
    const error = last?.type === StreamPartType.ERROR ? last.error : undefined;
    expect(error).toBeInstanceOf(CancelledError);
    expect(error?.message).toBe("Operation cancelled: user");
    expect(parts).toHaveLength(4);
  });

  test("forwards a native parts stream", async () => {
    const response = textResponse("hi");
    const source = new StubPartsSource("parts", [
      [
        { type: StreamPartType.TEXT_START },
        { type: StreamPartType.TEXT_DELTA, delta: "hi" },
        { type: StreamPartType.TEXT_END, text: "hi" },
        { type: StreamPartType.FINISH, response },
      ],
    ]);
    const parts = await collect(streamToolLoop({ source, messages }));
    expect(types(parts)).toEqual([
      StreamPartType.TEXT_START,
      StreamPartType.TEXT_DELTA,
      StreamPartType.TEXT_END,
      StreamPartType.FINISH,
    ]);
  });
});
