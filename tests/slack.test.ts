import { App } from "@slack/bolt";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { MarketingService } from "../src/service.js";
import { SlackMessageHandler } from "../src/slack/handlers.js";
import { clientInput, createTestService } from "./helpers.js";

describe("SlackMessageHandler", () => {
  let service: MarketingService;
  let handler: SlackMessageHandler;
  let app: App;

  const postMessage = () => vi.mocked(app.client.chat.postMessage);

  beforeEach(async () => {
    ({ service } = createTestService());
    await service.upsertClient(clientInput());

    app = new App({ token: "xoxb-test", signingSecret: "test-secret", tokenVerificationEnabled: false });
    vi.spyOn(app.client.chat, "postMessage").mockResolvedValue({ ok: true });
    handler = new SlackMessageHandler(app, service);
  });

  it("replies to a direct message in the same channel", async () => {
    await handler.processTurn({ userId: "U-SUNRISE", channel: "D100", text: "Hi" });

    expect(postMessage()).toHaveBeenCalledTimes(1);
    expect(postMessage().mock.calls[0][0]).toMatchObject({
      channel: "D100",
      text: expect.stringContaining("Hi Sunrise Bakery!")
    });
  });

  it("replies in the thread of a mention", async () => {
    await handler.processTurn({ userId: "U-SUNRISE", channel: "C200", text: "show", threadTs: "1700000000.000100" });

    expect(postMessage().mock.calls[0][0]).toMatchObject({
      channel: "C200",
      thread_ts: "1700000000.000100",
      text: "Nothing is waiting for approval right now. Send me an idea and I will draft something."
    });
  });

  it("turns a pasted image link into the idea's image", async () => {
    await handler.processTurn({
      userId: "U-SUNRISE",
      channel: "D100",
      text: "<https://example.com/buns.jpg|buns.jpg> New cinnamon buns every Friday morning"
    });
    await service.shutdown();

    const client = await service.records.findClientByHandle("U-SUNRISE");
    const ideas = client ? await service.records.listIdeas(client.id) : [];
    expect(ideas).toHaveLength(1);
    expect(ideas[0]).toMatchObject({
      summary: "New cinnamon buns every Friday morning",
      imageUrl: "https://example.com/buns.jpg"
    });
  });

  it("still replies when the turn fails", async () => {
    vi.spyOn(service, "handleChatMessage").mockRejectedValue(new Error("boom"));

    await handler.processTurn({ userId: "U-SUNRISE", channel: "D100", text: "Hi" });

    expect(postMessage().mock.calls[0][0]).toMatchObject({ text: "Sorry, something went wrong. Please try again." });
  });

  it("sends follow-ups to the user's direct messages", async () => {
    await handler.notify("U-SUNRISE", "Your draft is ready");

    expect(postMessage().mock.calls[0][0]).toEqual({ channel: "U-SUNRISE", text: "Your draft is ready" });
  });
});
