import { describe, it, expect } from "vitest";
import { ChannelListSchema, Config, GameDocumentSchema, SessionStateTypeSchema } from "../index";

describe("GameDocumentSchema", () => {
  const minimal = {
    id: 1,
    name: "Capitals",
    topics: [{ name: "Europe", key: "europe", bonus: 1, questions: [{ text: "France?", answers: ["paris"] }] }],
  };

  it("fills in default vocabulary and templates", () => {
    const doc = GameDocumentSchema.parse(minimal);
    expect(doc.maxAttempt).toBeUndefined();
    expect(doc.genericAnswers.stop).toEqual(["stop", "стоп"]);
    expect(doc.responses.quit).toBe(Config.templates.quit);
  });

  it("rejects a fractional bonus", () => {
    const result = GameDocumentSchema.safeParse({
      ...minimal,
      topics: [{ ...minimal.topics[0], bonus: 1.5 }],
    });
    expect(result.success).toBe(false);
  });
});

describe("ChannelListSchema", () => {
  it("accepts channels with and without a game", () => {
    const channels = ChannelListSchema.parse([
      { name: "page", channelId: "100", token: "test-token", gameId: 1 },
      { name: "idle", channelId: "200", token: "test-token" },
    ]);
    expect(channels[1].gameId).toBeUndefined();
  });

  it("rejects a channel without a token", () => {
    expect(ChannelListSchema.safeParse([{ name: "page", channelId: "100" }]).success).toBe(false);
  });
});

describe("SessionStateTypeSchema", () => {
  it("rejects transient machine states", () => {
    expect(SessionStateTypeSchema.safeParse("CHECKING_COMPLETION").success).toBe(false);
  });
});
