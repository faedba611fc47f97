import { describe, expect, it } from "vitest";
import { extractInputValue, extractInputValueByName, loadPage, takeSnapshot } from "../src";
import { PATIENT_PAGE } from "./scriptedFetch";

describe("page state", () => {
  const $ = loadPage(
    [
      '<input id="__VIEWSTATE" value="vs" />',
      '<input name="ctl00$ctl00$c$c$txtFirstName" id="ctl00_ctl00_c_c_txtFirstName" value="Jane" />',
      '<input id="empty" />',
      '<span id="notAnInput">x</span>'
    ].join("")
  );

  it("finds inputs by id", () => {
    expect(extractInputValue($, "__VIEWSTATE")).toBe("vs");
    expect(extractInputValue($, "ctl00_ctl00_c_c_txtFirstName")).toBe("Jane");
  });

  it("finds inputs by name containing control separators", () => {
    expect(extractInputValueByName($, "ctl00$ctl00$c$c$txtFirstName")).toBe("Jane");
  });

  it("reports absent inputs as null", () => {
    expect(extractInputValue($, "__EVENTVALIDATION")).toBeNull();
    expect(extractInputValue($, "notAnInput")).toBeNull();
  });

  it("reads an input without a value as empty", () => {
    expect(extractInputValue($, "empty")).toBe("");
  });

  it("takes a snapshot of the postback tokens", () => {
    expect(takeSnapshot(PATIENT_PAGE)).toEqual({
      viewState: "vs-token",
      viewStateGenerator: "ABC123",
      eventValidation: "ev-token",
      lobKey: "lob-key"
    });
  });

  it("tolerates pages without tokens", () => {
    expect(takeSnapshot("<html><body></body></html>")).toEqual({
      viewState: null,
      viewStateGenerator: null,
      eventValidation: null,
      lobKey: null
    });
  });
});
