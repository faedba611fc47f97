import {
  digitsOnly,
  formatDateMdy,
  formatTime12h,
  parseIsoDate,
  parseTime24
} from "@brightree-bridge/record-schema";

export const MIN_DATE_STR = "1753-01-02-00-00-00";
export const MAX_DATE_STR = "9999-12-31-00-00-00";

export type MaskedTextState = {
  enabled: boolean;
  emptyMessage: string;
  validationText: string;
  valueAsString: string;
  valueWithPromptAndLiterals: string;
  lastSetTextBoxValue: string;
};

export type DateInputState = {
  enabled: boolean;
  emptyMessage: string;
  validationText: string;
  valueAsString: string;
  minDateStr: string;
  maxDateStr: string;
  lastSetTextBoxValue: string;
};

export type TextBoxState = {
  enabled: boolean;
  emptyMessage: string;
  validationText: string;
  valueAsString: string;
  lastSetTextBoxValue: string;
};

export type ControlState = MaskedTextState | DateInputState | TextBoxState;

/**
 * Client state of a masked input (phone, SSN). `value` is either fully
 * formatted or the mask itself, in which case the control is empty.
 */
export function maskedTextState(value: string, mask: string): MaskedTextState {
  const empty = value === mask;
  const raw = empty ? "" : digitsOnly(value);

  return {
    enabled: true,
    emptyMessage: "",
    validationText: raw,
    valueAsString: empty ? mask : raw,
    valueWithPromptAndLiterals: value,
    lastSetTextBoxValue: value
  };
}

// The date input encodes values as YYYY-MM-DD-HH-MM-SS.
function dateTimeStamp(isoDate: string, time: string) {
  const date = parseIsoDate(isoDate);
  const clock = time ? parseTime24(time) : { hour: 0, minute: 0 };
  if (!date || !clock) {
    throw new Error(`Invalid date/time: ${isoDate} ${time}`.trim());
  }

  const pad = (value: number) => String(value).padStart(2, "0");
  return `${date.year}-${pad(date.month)}-${pad(date.day)}-${pad(clock.hour)}-${pad(clock.minute)}-00`;
}

export type DateInputValue = {
  /** Value posted under the picker's own name. */
  pickerValue: string;
  /** Value posted under `<picker>$dateInput`, as the user would see it. */
  displayValue: string;
  state: DateInputState;
};

export function dateInput(isoDate: string, time = ""): DateInputValue {
  if (!isoDate) {
    return {
      pickerValue: "",
      displayValue: "",
      state: {
        enabled: true,
        emptyMessage: "",
        validationText: "",
        valueAsString: "",
        minDateStr: MIN_DATE_STR,
        maxDateStr: MAX_DATE_STR,
        lastSetTextBoxValue: ""
      }
    };
  }

  const stamp = dateTimeStamp(isoDate, time);
  const displayValue = time ? `${formatDateMdy(isoDate)} ${formatTime12h(time)}` : formatDateMdy(isoDate);

  return {
    pickerValue: time ? stamp : isoDate,
    displayValue,
    state: {
      enabled: true,
      emptyMessage: "",
      validationText: stamp,
      valueAsString: stamp,
      minDateStr: MIN_DATE_STR,
      maxDateStr: MAX_DATE_STR,
      lastSetTextBoxValue: displayValue
    }
  };
}

export function textBoxState(value: string): TextBoxState {
  return {
    enabled: true,
    emptyMessage: "",
    validationText: value,
    valueAsString: value,
    lastSetTextBoxValue: value
  };
}
