import { describe, expect, it } from "vitest";

import { RecordingSender } from "../testing/fixtures.js";
import { formatEvent } from "./format.js";
import { Notifier } from "./notifier.js";

describe("Notifier", () => {
  it("delivers to the other recipients when one chat fails", async () => {
    const sender = new RecordingSender(new Set(["2"]));
    const notifier = new Notifier(sender);

    const report = await notifier.notify(
      { type: "recharge", balance: 60, previous: 20, delta: 40, updateTime: "2024-05-01 10:00" },
      ["1", "2", "3"],
    );

    expect(report).toEqual({ delivered: ["1", "3"], failed: ["2"] });
    const text = "🔔 Balance recharged\n• 💰 Balance: 60.00\n• ➕ Added: 40.00\n• 🕒 Updated: 2024-05-01 10:00";
    expect(sender.sent).toEqual([
      { sessionId: "1", text },
      { sessionId: "3", text },
    ]);
  });

  it("handles an empty recipient list", async () => {
    const notifier = new Notifier(new RecordingSender());
    expect(await notifier.notify({ type: "no-credentials" }, [])).toEqual({ delivered: [], failed: [] });
  });
});

describe("formatEvent", () => {
  it("includes balance and threshold in low-balance alerts", () => {
    expect(formatEvent({ type: "low-balance", balance: 9.5, threshold: 10, updateTime: null })).toBe(
      "⚠️ Low balance alert\n• 💰 Balance: 9.50\n• 📉 Threshold: 10.00",
    );
  });

  it("hints at reconfiguring credentials on auth failures", () => {
    expect(formatEvent({ type: "auth-failure", message: "登录过期" })).toBe(
      [
        "⚠️ Authentication with the balance service failed",
        "• 💬 登录过期",
        "Check ELECTRICITY_ACCOUNT / ELECTRICITY_PASSWORD or set a fresh token with /settoken <token>.",
      ].join("\n"),
    );
  });

  it("keeps remote failures generic", () => {
    expect(formatEvent({ type: "remote-failure", message: "socket hang up" })).toBe(
      "⚠️ Balance check failed. Please try again later.",
    );
  });
});
