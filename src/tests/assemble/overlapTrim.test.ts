import { expect, test } from "vitest";
import { trimOverlap } from "../../assemble/overlapTrim.js";

const options = { windowChars: 400, minMatchChars: 12 };

test("repeated words at an English boundary are cut from the next fragment", () => {
  const result = trimOverlap(
    "We talked about the history of the city and its harbor",
    "the city and its harbor. Next we move to the museum.",
    options,
  );
  expect(result).toEqual({ text: "Next we move to the museum.", matchedChars: 19 });
});

test("case and punctuation differences do not prevent a match", () => {
  const result = trimOverlap("We walked to The City Hall", "the city, hall is open", { ...options, minMatchChars: 5 });
  expect(result).toEqual({ text: "is open", matchedChars: 11 });
});

test("text without spaces is matched character by character", () => {
  const result = trimOverlap(
    "今日は東京の歴史についてお話しします。江戸時代の町並みは",
    "江戸時代の町並みは、とても美しかったです。",
    { ...options, minMatchChars: 5 },
  );
  expect(result).toEqual({ text: "とても美しかったです。", matchedChars: 9 });
});

test("overlap shorter than the minimum is left alone", () => {
  const next = "one more thing before we stop";
  expect(trimOverlap("that was the end of part one", next, options)).toEqual({ text: next, matchedChars: 0 });
});

test("unrelated fragments are left alone", () => {
  const next = "A completely different sentence.";
  expect(trimOverlap("Nothing in common here at all", next, options)).toEqual({ text: next, matchedChars: 0 });
});

test("a fragment fully contained in the previous tail trims to nothing", () => {
  const result = trimOverlap("alpha beta gamma delta epsilon", "gamma delta epsilon", { ...options, minMatchChars: 5 });
  expect(result).toEqual({ text: "", matchedChars: 17 });
});
