import {
  asObject,
  optionalBoolean,
  optionalEnum,
  optionalNumber,
  optionalNumberRecord,
  optionalString,
  optionalStringArray,
  readJsonBody,
  requireNumber,
  requireString,
  RequestValidationError,
} from "./request-validation";

describe("asObject / readJsonBody", () => {
  test("arrays and primitives are rejected", () => {
    expect(() => asObject([1])).toThrow("Request body must be a JSON object");
    expect(() => asObject("x")).toThrow(RequestValidationError);
  });

  test("malformed JSON becomes a validation error", async () => {
    const req = { json: async (): Promise<unknown> => { throw new SyntaxError("Unexpected token"); } };
    await expect(readJsonBody(req)).rejects.toThrow("Request body is not valid JSON");
  });

  test("object body passes through", async () => {
    await expect(readJsonBody({ json: async () => ({ a: 1 }) })).resolves.toEqual({ a: 1 });
  });
});

describe("numbers", () => {
  test("numeric strings are accepted", () => {
    expect(requireNumber({ age: "4.5" }, "age")).toBe(4.5);
  });

  test("missing required field", () => {
    expect(() => requireNumber({}, "fleet_size")).toThrow("Missing required field: fleet_size");
  });

  test("range and integer rules", () => {
    expect(() => requireNumber({ n: -1 }, "n", { min: 0 })).toThrow('"n" must be >= 0');
    expect(() => requireNumber({ n: 101 }, "n", { max: 100 })).toThrow('"n" must be <= 100');
    expect(() => requireNumber({ n: 2.5 }, "n", { integer: true })).toThrow('"n" must be an integer');
    expect(() => requireNumber({ n: "abc" }, "n")).toThrow('"n" must be a number');
  });

  test("optional uses the fallback only when absent", () => {
    expect(optionalNumber({}, "n", 7)).toBe(7);
    expect(optionalNumber({ n: 0 }, "n", 7)).toBe(0);
  });
});

describe("strings, booleans, enums", () => {
  test("required string must be non-blank", () => {
    expect(requireString({ csv: "a;b" }, "csv")).toBe("a;b");
    expect(() => requireString({ csv: "  " }, "csv")).toThrow("Missing required field: csv");
  });

  test("optional string type check", () => {
    expect(optionalString({}, "country", "FR")).toBe("FR");
    expect(() => optionalString({ country: 3 }, "country", "FR")).toThrow('"country" must be a string');
  });

  test("boolean", () => {
    expect(optionalBoolean({ live_data: true }, "live_data", false)).toBe(true);
    expect(() => optionalBoolean({ live_data: "yes" }, "live_data", false)).toThrow('"live_data" must be true or false');
  });

  test("enum", () => {
    const goals = ["balanced", "cost_first", "eco_first"] as const;
    expect(optionalEnum({ goal: "eco_first" }, "goal", goals, "balanced")).toBe("eco_first");
    expect(optionalEnum({}, "goal", goals, "balanced")).toBe("balanced");
    expect(() => optionalEnum({ goal: "cheap" }, "goal", goals, "balanced"))
      .toThrow("Invalid goal. Valid: balanced, cost_first, eco_first");
  });
});

describe("collections", () => {
  test("string array", () => {
    expect(optionalStringArray({ providers: ["AWS", "GCP"] }, "providers", [])).toEqual(["AWS", "GCP"]);
    expect(() => optionalStringArray({ providers: ["AWS", 1] }, "providers", [])).toThrow('"providers" must be an array of strings');
  });

  test("number record", () => {
    expect(optionalNumberRecord({ grid: { FR: 0.05, DE: "0.3" } }, "grid")).toEqual({ FR: 0.05, DE: 0.3 });
    expect(optionalNumberRecord({}, "grid")).toEqual({});
    expect(() => optionalNumberRecord({ grid: { FR: -1 } }, "grid")).toThrow('"grid.FR" must be >= 0');
  });
});
