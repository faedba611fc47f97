import { describe, expect, it } from "vitest";
import { cleanText, findLabeledValue, parsePatientSections } from "../src";
import { PATIENT_RESULT_PAGE } from "./scriptedFetch";

const VIEW_PAGE = [
  "<!DOCTYPE html><html><body>",
  "<fieldset><legend> Personal Information </legend><table>",
  '<tr><td><label for="lblName">Name:</label></td><td><span id="lblName">DOE,   JANE</span></td></tr>',
  "<tr><td><label>Address</label></td><td>\n   123 Main St\n\n   Springfield, CA\n</td></tr>",
  "</table></fieldset>",
  '<fieldset><legend>Contact</legend><div><label for="txtEmail">Email:</label>',
  '<input id="txtEmail" value="jane@example.com" /></div></fieldset>',
  "<fieldset><div><label>Orphan</label><span>ignored</span></div></fieldset>",
  "</body></html>"
].join("");

describe("cleanText", () => {
  it("collapses whitespace and drops blank lines", () => {
    expect(cleanText("  a \t b \n\n   \n c  ")).toBe("a b\nc");
  });
});

describe("parsePatientSections", () => {
  it("groups labelled values by fieldset legend", () => {
    expect(parsePatientSections(VIEW_PAGE)).toEqual({
      "Personal Information": {
        Name: "DOE, JANE",
        Address: "123 Main St\nSpringfield, CA"
      },
      Contact: {
        Email: "jane@example.com"
      }
    });
  });

  it("reads the value beside a label without a target", () => {
    const html = "<fieldset><legend>Insurance</legend><div><label>Payor:</label><span>ACME HEALTH</span></div></fieldset>";

    expect(parsePatientSections(html)).toEqual({ Insurance: { Payor: "ACME HEALTH" } });
  });

  it("keeps the fields of a nested fieldset under its own legend", () => {
    const html = [
      "<fieldset><legend>Outer</legend><label>A:</label><span>1</span>",
      "<fieldset><legend>Inner</legend><label>B:</label><span>2</span></fieldset>",
      "</fieldset>"
    ].join("");

    expect(parsePatientSections(html)).toEqual({ Outer: { A: "1" }, Inner: { B: "2" } });
  });
});

describe("findLabeledValue", () => {
  it("reads a labelled field anywhere on the page", () => {
    expect(findLabeledValue(PATIENT_RESULT_PAGE, "Patient ID")).toBe("1001");
  });

  it("returns null for a missing label", () => {
    expect(findLabeledValue(PATIENT_RESULT_PAGE, "Account Number")).toBeNull();
  });
});
