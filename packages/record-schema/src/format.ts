export const PHONE_MASK = "(___) ___-____";
export const SSN_MASK = "___-__-____";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_24H = /^([01]\d|2[0-3]):([0-5]\d)$/;

export function digitsOnly(value: string) {
  return value.replace(/\D/g, "");
}

/**
 * Formats a US phone number as `(XXX) XXX-XXXX`. Missing values become the
 * portal's empty mask. Returns null when the digits do not form a US number.
 */
export function normalizePhone(value: string | null | undefined): string | null {
  if (!value || value === PHONE_MASK) return PHONE_MASK;

  let digits = digitsOnly(value);
  if (digits.length === 11 && digits.startsWith("1")) {
    digits = digits.slice(1);
  }

  if (digits.length !== 10) return null;

  return `(${digits.slice(0, 3)}) ${digits.slice(3, 6)}-${digits.slice(6)}`;
}

export function normalizeSsn(value: string | null | undefined): string | null {
  if (!value || value === SSN_MASK) return SSN_MASK;

  const digits = digitsOnly(value);
  if (digits.length !== 9) return null;

  return `${digits.slice(0, 3)}-${digits.slice(3, 5)}-${digits.slice(5)}`;
}

export function formatPhone(value: string | null | undefined): string {
  const formatted = normalizePhone(value);
  if (formatted === null) {
    throw new Error("Phone number must be a valid US number (10 digits)");
  }
  return formatted;
}

export function formatSsn(value: string | null | undefined): string {
  const formatted = normalizeSsn(value);
  if (formatted === null) {
    throw new Error("SSN must be 9 digits");
  }
  return formatted;
}

export type DateParts = { year: number; month: number; day: number };

export function parseIsoDate(value: string): DateParts | null {
  const match = ISO_DATE.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const probe = new Date(Date.UTC(year, month - 1, day));

  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return null;
  }

  return { year, month, day };
}

export type TimeParts = { hour: number; minute: number };

export function parseTime24(value: string): TimeParts | null {
  const match = TIME_24H.exec(value);
  if (!match) return null;
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

// M/D/YYYY, as the portal's date inputs display it.
export function formatDateMdy(isoDate: string): string {
  if (!isoDate) return "";
  const parts = parseIsoDate(isoDate);
  if (!parts) {
    throw new Error(`Invalid date: ${isoDate}`);
  }
  return `${parts.month}/${parts.day}/${parts.year}`;
}

export function formatTime12h(time: string): string {
  const parts = parseTime24(time);
  if (!parts) {
    throw new Error(`Invalid time: ${time}`);
  }
  const suffix = parts.hour < 12 ? "AM" : "PM";
  const hour = parts.hour % 12 === 0 ? 12 : parts.hour % 12;
  return `${hour}:${String(parts.minute).padStart(2, "0")} ${suffix}`;
}
