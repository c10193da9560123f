import { some } from "@selectable/shared/types";
import { describe, expect, it } from "vitest";
import { dump } from "./dump.js";
import {
  type SelectableSequence,
  empty,
  singleton,
} from "./SelectableSequence.js";

describe("dump", () => {
  it("should render every part", () => {
    const seq: SelectableSequence<string, number> = {
      prefix: ["a", "b"],
      selection: some(3),
      suffix: ["d"],
    };
    expect(dump(seq)).toBe(
      "prefix: ['a', 'b']\nselection: 3\nsuffix: ['d']",
    );
  });

  it("should render a missing selection", () => {
    expect(dump(empty())).toBe(
      "prefix: []\nselection: <none>\nsuffix: []",
    );
  });

  it("should use the given formatters", () => {
    const seq: SelectableSequence<number, number> = {
      prefix: [1],
      selection: some(2),
      suffix: [],
    };
    expect(
      dump(seq, {
        showUnselected: (n) => `(${n})`,
        showSelected: (n) => `[${n}]`,
      }),
    ).toBe("prefix: [(1)]\nselection: [2]\nsuffix: []");
  });

  it("should inspect nested values", () => {
    expect(
      dump(singleton({ draft: "x", tags: ["y"] })),
    ).toBe(
      "prefix: []\nselection: { draft: 'x', tags: [ 'y' ] }\nsuffix: []",
    );
  });
});
