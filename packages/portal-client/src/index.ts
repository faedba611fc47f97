export * from "./client";
export * from "./errors";
export * from "./http/interpret";
export * from "./http/portalHttp";
export * from "./http/transport";
export * from "./keyLookup";
export * from "./pageState";
export * from "./patientView";
export * from "./postback";
export * from "./session";
export * from "./forms/controlState";
export * from "./forms/payload";
export * from "./forms/patientForm";
export * from "./forms/salesOrderForm";
