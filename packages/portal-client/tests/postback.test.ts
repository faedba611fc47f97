import { describe, expect, it } from "vitest";
import { IntegrationApiError, decodeRedirectSegment, parsePostbackRedirect } from "../src";
import { PATIENT_SAVE_RESPONSE } from "./scriptedFetch";

describe("postback redirect parsing", () => {
  it("decodes the patient save redirect", () => {
    const url = parsePostbackRedirect(PATIENT_SAVE_RESPONSE, "patientSave", "https://brightree.net");

    expect(url.toString()).toBe(
      "https://brightree.net/F1/02873/Nation/Patient/frmPatientPersonal.aspx?PatientKey=1234"
    );
  });

  it("reads the sales order redirect from the third segment", () => {
    const response = "40|pageRedirect|%2fpath%3fSalesOrderKey%3d999%26x%3d1|";

    expect(decodeRedirectSegment(response, "salesOrderSave")).toBe("/path?SalesOrderKey=999&x=1");
    expect(parsePostbackRedirect(response, "salesOrderSave", "https://brightree.net").searchParams.get(
      "SalesOrderKey"
    )).toBe("999");
  });

  it("fails with the decoded text when the portal reports an exception", () => {
    const response =
      "80|pageRedirect||%2fError.aspx%3fmsg%3dSystem.NullReferenceException%3a%20Object%20reference|";

    let caught: unknown;
    try {
      decodeRedirectSegment(response, "patientSave");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(IntegrationApiError);
    expect(caught).toMatchObject({
      message:
        "Brightree reported an exception: /Error.aspx?msg=System.NullReferenceException: Object reference",
      details: {
        kind: "patientSave",
        segment: "/Error.aspx?msg=System.NullReferenceException: Object reference"
      }
    });
  });

  it("matches the exception marker case-insensitively", () => {
    expect(() => decodeRedirectSegment("1|x||%2fEXCEPTION|", "patientSave")).toThrow(
      "Brightree reported an exception: /EXCEPTION"
    );
  });

  it("rejects responses without a redirect segment", () => {
    expect(() => decodeRedirectSegment("1|#||", "patientSave")).toThrow("Unexpected postback response");
  });

  it("rejects a segment that is not valid percent-encoding", () => {
    expect(() => decodeRedirectSegment("1|pageRedirect|%E0%A4%A|", "salesOrderSave")).toThrow(
      "Malformed redirect segment in postback response"
    );
  });
});
