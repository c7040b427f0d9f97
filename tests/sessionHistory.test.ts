import { describe, expect, it } from "vitest";
import { ChatHistory, SearchHistory } from "../src/services/sessionHistory.js";

describe("SearchHistory", () => {
  it("keeps at most five queries and drops the oldest first", () => {
    const history = new SearchHistory();
    for (const query of ["q1", "q2", "q3", "q4", "q5", "q6"]) {
      history.record(query);
    }

    expect(history.size).toBe(5);
    expect(history.recent()).toEqual(["q6", "q5", "q4", "q3", "q2"]);
  });

  it("ignores a query that is already in the history", () => {
    const history = new SearchHistory(3);
    history.record("consent");
    history.record("transfers");
    history.record("consent");

    expect(history.recent()).toEqual(["transfers", "consent"]);
  });
});

describe("ChatHistory", () => {
  it("keeps every turn in order", () => {
    const chat = new ChatHistory();
    chat.append("user", "What is a controller?");
    chat.append("assistant", "The body that decides purposes and means.");

    expect(chat.list().map((turn) => [turn.role, turn.content])).toEqual([
      ["user", "What is a controller?"],
      ["assistant", "The body that decides purposes and means."],
    ]);
  });

  it("returns a copy of the turns", () => {
    const chat = new ChatHistory();
    chat.append("user", "Who is a processor?");

    chat.list().pop();

    expect(chat.list()).toHaveLength(1);
  });
});
