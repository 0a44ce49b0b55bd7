import { findColumn, parseCsvTable, parseNumber } from "./csv-parser";

describe("parseCsvTable", () => {
  test("strips BOM, CRLF and blank lines", () => {
    expect(parseCsvTable("\uFEFFa;b\r\n1;2\r\n\r\n")).toEqual({ header: ["a", "b"], rows: [["1", "2"]] });
  });

  test("quoted field spanning lines stays in one record", () => {
    const table = parseCsvTable('name,unit\n"Laptop","Couture\nParis"\nTablet,Jewelry');
    expect(table?.rows).toEqual([
      ["Laptop", "Couture\nParis"],
      ["Tablet", "Jewelry"],
    ]);
  });

  test("doubled quotes unescape", () => {
    expect(parseCsvTable('a,b\n"say ""hi""",1')?.rows).toEqual([['say "hi"', "1"]]);
  });

  test("lines wrapped in one pair of quotes are unwrapped", () => {
    const table = parseCsvTable('"equipment_type,annual_salary,Category"\n"Laptop,""55,000"",Inventory"');
    expect(table).toEqual({
      header: ["equipment_type", "annual_salary", "Category"],
      rows: [["Laptop", "55,000", "Inventory"]],
    });
  });

  test("one-column table keeps quoted separators", () => {
    const table = parseCsvTable('Device_Model\n"Screen, 27in"\nTablet');
    expect(table?.rows).toEqual([["Screen, 27in"], ["Tablet"]]);
  });

  test("no header gives null", () => {
    expect(parseCsvTable("  \n\n")).toBeNull();
  });
});

describe("helpers", () => {
  test("findColumn matches aliases loosely", () => {
    expect(findColumn(["Device Model", "Age"], ["Device_Model"])).toBe(0);
    expect(findColumn(["Device Model", "Age"], ["Persona"])).toBe(-1);
  });

  test("parseNumber accepts a decimal comma", () => {
    expect(parseNumber("2,5")).toBe(2.5);
    expect(parseNumber("abc")).toBeNull();
    expect(parseNumber("")).toBeNull();
  });
});
