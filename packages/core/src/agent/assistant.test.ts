import { describe, it, expect } from "vitest";
import { MalformedCommandError, UnknownSessionError } from "../errors.js";
import { FakeTools, ScriptedModel, text } from "../testing/fakes.js";
import { ShoppingAssistant } from "./assistant.js";

function makeAssistant(script: ConstructorParameters<typeof ScriptedModel>[0]) {
  let n = 0;
  return new ShoppingAssistant({
    model: new ScriptedModel(script),
    tools: new FakeTools({}),
    account: "test-account",
    newId: () => `s${++n}`,
  });
}

describe("ShoppingAssistant", () => {
  it("keeps sessions independent", async () => {
    const assistant = makeAssistant([text("Nice budget!"), text("Hello!")]);
    const a = assistant.startSession();
    const b = assistant.startSession();

    expect([a.id, b.id]).toEqual(["s1", "s2"]);

    await assistant.submitUtterance(a, "my budget is 80");
    await assistant.submitUtterance(b, "hi");

    expect(assistant.sessionState(a).budgetRange).toBe(80);
    expect(assistant.sessionState(b).budgetRange).toBeNull();
    expect(assistant.sessionState(b).messages).toHaveLength(4);
  });

  it("rejects blank utterances without touching the session", async () => {
    const assistant = makeAssistant([]);
    const h = assistant.startSession();

    await expect(assistant.submitUtterance(h, "   ")).rejects.toBeInstanceOf(MalformedCommandError);
    expect(assistant.sessionState(h).messages).toHaveLength(2);
    expect(assistant.sessionState(h).conversationContext).toEqual([]);
  });

  it("resets through a command", async () => {
    const assistant = makeAssistant([text("Sure.")]);
    const h = assistant.startSession();
    await assistant.submitUtterance(h, "spend 60 max");

    expect(assistant.handleCommand(h, '{"type":"reset"}')).toEqual({ type: "reset_complete" });
    expect(assistant.sessionState(h).budgetRange).toBeNull();
    expect(assistant.sessionState(h).messages).toHaveLength(2);
  });

  it("answers intro with the given or the default text", () => {
    const assistant = makeAssistant([]);
    const h = assistant.startSession();

    expect(assistant.handleCommand(h, '{"type":"intro","text":"Welcome back!"}')).toEqual({
      type: "intro",
      text: "Welcome back!",
    });
    expect(assistant.handleCommand(h, { type: "intro" })).toEqual({
      type: "intro",
      text: "Hello! I'm your shopping assistant.",
    });
  });

  it("leaves the session unchanged on a malformed command", async () => {
    const assistant = makeAssistant([text("Sure.")]);
    const h = assistant.startSession();
    await assistant.submitUtterance(h, "budget 90");

    expect(() => assistant.handleCommand(h, '{"type":"dance"}')).toThrow(MalformedCommandError);
    expect(assistant.sessionState(h).budgetRange).toBe(90);
    expect(assistant.sessionState(h).messages).toHaveLength(4);
  });

  it("refuses unknown or ended sessions", async () => {
    const assistant = makeAssistant([]);
    const h = assistant.startSession();

    expect(assistant.endSession(h)).toBe(true);
    expect(assistant.endSession(h)).toBe(false);
    expect(() => assistant.resetSession(h)).toThrow(UnknownSessionError);
    await expect(assistant.submitUtterance({ id: "nope" }, "hi")).rejects.toThrow("No active session with id nope");
  });
});
