import { extractMaxPercentage, inferTruth } from "../business/truth";

describe("extractMaxPercentage", () => {
  test("returns the largest percentage mentioned", () => {
    expect(extractMaxPercentage("Shares up 12.5% in a week, 31% for the month")).toBe(31);
  });

  test("treats 'thirty percent' as 30", () => {
    expect(extractMaxPercentage("Stock jumped Thirty Percent")).toBe(30);
  });

  test("returns 0 without any percentage", () => {
    expect(extractMaxPercentage("No figures here")).toBe(0);
  });
});

describe("inferTruth", () => {
  test("no hits cannot be determined", () => {
    expect(inferTruth([], 0.3)).toEqual({
      actualIncrease: undefined,
      rationale: "No verify-window evidence found.",
    });
  });

  test("a move at or above the target is an increase", () => {
    expect(
      inferTruth([{ title: "RR shares surge 34% in December" }], 0.3)
    ).toEqual({
      actualIncrease: true,
      rationale: "Found mention of 34.0% move.",
    });
  });

  test("exactly the target counts", () => {
    expect(
      inferTruth([{ snippet: "up thirty percent since summer" }], 0.3)
        .actualIncrease
    ).toBe(true);
  });

  test("a smaller move is not an increase", () => {
    expect(
      inferTruth(
        [
          { title: "RR edges higher", snippet: "Shares up 12% this month" },
          { title: "Index gains 3.5%" },
        ],
        0.3
      )
    ).toEqual({
      actualIncrease: false,
      rationale: "Max move mentioned: 12.0% (< 30%).",
    });
  });
});
