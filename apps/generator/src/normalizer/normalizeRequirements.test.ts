import { describe, it, expect } from "vitest";
import { EmptyInputError } from "../errors";
import { normalizeLineEndings, normalizeRequirements } from "./normalizeRequirements";

describe("normalizeRequirements", () => {
  it("keeps list numbers as requirement ids", () => {
    const input = "1. User can log in with valid credentials.\n2. User sees error on invalid password.";
    const units = normalizeRequirements(input);

    expect(units.map((unit) => unit.id)).toEqual(["1", "2"]);
    expect(units[0]?.text).toBe("User can log in with valid credentials.");
    expect(units[1]?.text).toBe("User sees error on invalid password.");
    expect(units[0]?.sourceOffset.start).toBe(3);
    for (const unit of units) {
      expect(input.slice(unit.sourceOffset.start, unit.sourceOffset.end)).toBe(unit.text);
    }
  });

  it("fails on blank input", () => {
    expect(() => normalizeRequirements("")).toThrow(EmptyInputError);
    expect(() => normalizeRequirements("  \n\t\n ")).toThrow(EmptyInputError);
  });

  it("splits paragraphs at sentence ends followed by a capital letter", () => {
    const units = normalizeRequirements(
      "The system stores orders. Admins can export reports! Is this tested? yes it is."
    );

    expect(units.map((unit) => [unit.id, unit.text])).toEqual([
      ["R1", "The system stores orders."],
      ["R2", "Admins can export reports!"],
      ["R3", "Is this tested? yes it is."],
    ]);
  });

  it("attaches the nearest heading as section", () => {
    const units = normalizeRequirements(
      "# Login\n- Users can sign in.\n- Users can sign out.\n\n## Billing\nInvoices are emailed monthly."
    );

    expect(units.map((unit) => [unit.id, unit.section, unit.text])).toEqual([
      ["R1", "Login", "Users can sign in."],
      ["R2", "Login", "Users can sign out."],
      ["R3", "Billing", "Invoices are emailed monthly."],
    ]);
  });

  it("folds continuation lines into the list item", () => {
    const units = normalizeRequirements("1. First line\n   continues here. Still item one.\n2. Second.");

    expect(units).toHaveLength(2);
    expect(units[0]?.text).toBe("First line continues here. Still item one.");
    expect(units[1]?.id).toBe("2");
  });

  it("suffixes repeated list numbers", () => {
    const units = normalizeRequirements("1. A thing.\n1. Another thing.");
    expect(units.map((unit) => unit.id)).toEqual(["1", "1-2"]);
  });

  it("reports offsets against LF-normalized text", () => {
    const input = "1. Alpha.\r\n2. Beta.";
    const units = normalizeRequirements(input);

    expect(units[1]?.sourceOffset).toEqual({ start: 13, end: 18 });
    expect(normalizeLineEndings(input).slice(13, 18)).toBe("Beta.");
  });

  it("falls back to headings when nothing else is present", () => {
    const units = normalizeRequirements("# Checkout");
    expect(units).toEqual([{ id: "R1", text: "Checkout", sourceOffset: { start: 2, end: 10 } }]);
  });

  it("keeps text made only of untitled heading markers as one unit", () => {
    expect(normalizeRequirements("# #")).toEqual([{ id: "R1", text: "# #", sourceOffset: { start: 0, end: 3 } }]);
    expect(normalizeRequirements("## ##")).toEqual([{ id: "R1", text: "## ##", sourceOffset: { start: 0, end: 5 } }]);
    expect(normalizeRequirements("#\t#")).toEqual([{ id: "R1", text: "# #", sourceOffset: { start: 0, end: 3 } }]);
    expect(normalizeRequirements("\n  #  \n")).toEqual([{ id: "R1", text: "#", sourceOffset: { start: 3, end: 4 } }]);
  });

  it("is deterministic", () => {
    const input = "## Orders\n1. Orders can be cancelled.\nRefunds are issued within 5 days. Emails are sent.";
    expect(normalizeRequirements(input)).toEqual(normalizeRequirements(input));
  });
});
