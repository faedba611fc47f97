import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import {
  ExistingPatientSchema,
  NewPatientSchema,
  SalesOrderSchema,
  formatDateMdy,
  formatPhone,
  formatSsn,
  formatTime12h
} from "../src";

describe("formatPhone", () => {
  it("formats ten digits", () => {
    expect(formatPhone("1234567890")).toBe("(123) 456-7890");
  });

  it("drops a leading country code", () => {
    expect(formatPhone("1-555-867-5309")).toBe("(555) 867-5309");
  });

  it("returns the mask for empty input", () => {
    expect(formatPhone("")).toBe("(___) ___-____");
    expect(formatPhone(null)).toBe("(___) ___-____");
    expect(formatPhone("(___) ___-____")).toBe("(___) ___-____");
  });

  it("rejects other digit counts", () => {
    expect(() => formatPhone("555123")).toThrow("Phone number must be a valid US number (10 digits)");
    expect(() => formatPhone("25551234567")).toThrow("Phone number must be a valid US number (10 digits)");
  });
});

describe("formatSsn", () => {
  it("formats nine digits", () => {
    expect(formatSsn("123456789")).toBe("123-45-6789");
  });

  it("returns the mask for empty input", () => {
    expect(formatSsn(undefined)).toBe("___-__-____");
  });

  it("rejects other digit counts", () => {
    expect(() => formatSsn("12345")).toThrow("SSN must be 9 digits");
  });
});

describe("formatDateMdy", () => {
  it("drops leading zeros", () => {
    expect(formatDateMdy("2024-03-05")).toBe("3/5/2024");
    expect(formatDateMdy("1999-12-31")).toBe("12/31/1999");
  });

  it("keeps empty input empty", () => {
    expect(formatDateMdy("")).toBe("");
  });

  it("rejects impossible dates", () => {
    expect(() => formatDateMdy("2023-02-29")).toThrow("Invalid date: 2023-02-29");
  });
});

describe("formatTime12h", () => {
  it("converts 24-hour times", () => {
    expect(formatTime12h("00:05")).toBe("12:05 AM");
    expect(formatTime12h("12:00")).toBe("12:00 PM");
    expect(formatTime12h("14:30")).toBe("2:30 PM");
  });
});

describe("patient schemas", () => {
  it("normalizes a new patient", () => {
    const patient = NewPatientSchema.parse({
      nameFirst: "Jane",
      nameLast: "Doe",
      phoneHome: "555.867.5309",
      ssn: "123 45 6789"
    });

    expect(patient).toEqual({
      patientId: 0,
      nameFirst: "Jane",
      nameLast: "Doe",
      nameMiddle: "",
      nameSuffix: "",
      namePreferred: "",
      email: "",
      dob: "",
      ssn: "123-45-6789",
      phoneHome: "(555) 867-5309",
      phoneMobile: "(___) ___-____",
      phoneFax: "(___) ___-____"
    });
  });

  it("rejects a malformed phone number", () => {
    const result = ExistingPatientSchema.safeParse({ patientId: 42, phoneMobile: "12345" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(["phoneMobile"]);
      expect(result.error.issues[0].message).toBe("Phone number must be a valid US number (10 digits)");
    }
  });

  it("rejects a malformed email and date of birth", () => {
    expect(() => NewPatientSchema.parse({ email: "not-an-email" })).toThrow(ZodError);
    expect(() => NewPatientSchema.parse({ dob: "03/05/2024" })).toThrow(ZodError);
  });

  it("requires a positive id for existing patients", () => {
    expect(ExistingPatientSchema.safeParse({ patientId: 0 }).success).toBe(false);
    expect(ExistingPatientSchema.parse({ patientId: 42 }).patientId).toBe(42);
  });
});

describe("sales order schema", () => {
  it("applies defaults", () => {
    const order = SalesOrderSchema.parse({ patientId: 42, orderDate: "2024-03-05" });

    expect(order).toEqual({
      patientId: 42,
      orderType: "standard",
      orderDate: "2024-03-05",
      scheduledDeliveryDate: "",
      scheduledDeliveryTime: "",
      referenceNumber: "",
      notes: ""
    });
  });

  it("rejects a delivery time without a delivery date", () => {
    const result = SalesOrderSchema.safeParse({
      patientId: 42,
      orderDate: "2024-03-05",
      scheduledDeliveryTime: "09:30"
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(["scheduledDeliveryTime"]);
    }
  });

  it("rejects a time outside 24-hour range", () => {
    const result = SalesOrderSchema.safeParse({
      patientId: 42,
      orderDate: "2024-03-05",
      scheduledDeliveryDate: "2024-03-06",
      scheduledDeliveryTime: "24:00"
    });

    expect(result.success).toBe(false);
  });
});
