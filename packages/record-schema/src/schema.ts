import { z } from "zod";
import { normalizePhone, normalizeSsn, parseIsoDate, parseTime24 } from "./format";

const EMAIL_PATTERN = /^[^@]+@[^@]+\.[^@]+/;

const OptionalTextSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

const PhoneSchema = z
  .string()
  .nullish()
  .transform((value, ctx) => {
    const formatted = normalizePhone(value);
    if (formatted === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Phone number must be a valid US number (10 digits)"
      });
      return z.NEVER;
    }
    return formatted;
  });

const SsnSchema = z
  .string()
  .nullish()
  .transform((value, ctx) => {
    const formatted = normalizeSsn(value);
    if (formatted === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "SSN must be 9 digits" });
      return z.NEVER;
    }
    return formatted;
  });

const EmailSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? "")
  .refine((value) => value === "" || EMAIL_PATTERN.test(value), "Invalid email format");

export const IsoDateSchema = z
  .string()
  .refine((value) => parseIsoDate(value) !== null, "Date must be in YYYY-MM-DD format");

const OptionalIsoDateSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? "")
  .refine((value) => value === "" || parseIsoDate(value) !== null, "Date must be in YYYY-MM-DD format");

const OptionalTimeSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? "")
  .refine((value) => value === "" || parseTime24(value) !== null, "Time must be in 24-hour HH:MM format");

export const BasePatientSchema = z.object({
  patientId: z.number().int().nonnegative(),
  nameFirst: OptionalTextSchema,
  nameLast: OptionalTextSchema,
  nameMiddle: OptionalTextSchema,
  nameSuffix: OptionalTextSchema,
  namePreferred: OptionalTextSchema,
  email: EmailSchema,
  dob: OptionalIsoDateSchema,
  ssn: SsnSchema,
  phoneHome: PhoneSchema,
  phoneMobile: PhoneSchema,
  phoneFax: PhoneSchema
});

export const NewPatientSchema = BasePatientSchema.extend({
  patientId: z.literal(0).default(0)
});

export const ExistingPatientSchema = BasePatientSchema.extend({
  patientId: z.number().int().positive()
});

export const SalesOrderTypeSchema = z.enum(["standard", "pickup_exchange"]);

export const SalesOrderSchema = z
  .object({
    patientId: z.number().int().positive(),
    orderType: SalesOrderTypeSchema.default("standard"),
    orderDate: IsoDateSchema,
    scheduledDeliveryDate: OptionalIsoDateSchema,
    scheduledDeliveryTime: OptionalTimeSchema,
    branchKey: z.string().regex(/^\d+$/, "branchKey must be numeric").optional(),
    placeOfService: z.string().regex(/^\d+$/, "placeOfService must be numeric").optional(),
    referenceNumber: OptionalTextSchema,
    notes: OptionalTextSchema
  })
  .superRefine((order, ctx) => {
    if (order.scheduledDeliveryTime && !order.scheduledDeliveryDate) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["scheduledDeliveryTime"],
        message: "scheduledDeliveryTime requires scheduledDeliveryDate"
      });
    }
  });

export type Patient = z.infer<typeof BasePatientSchema>;
export type PatientInput = z.input<typeof BasePatientSchema>;
export type NewPatientInput = z.input<typeof NewPatientSchema>;
export type ExistingPatientInput = z.input<typeof ExistingPatientSchema>;
export type SalesOrder = z.infer<typeof SalesOrderSchema>;
export type SalesOrderInput = z.input<typeof SalesOrderSchema>;
export type SalesOrderType = z.infer<typeof SalesOrderTypeSchema>;
