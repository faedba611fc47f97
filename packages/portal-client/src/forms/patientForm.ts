import { PHONE_MASK, SSN_MASK, type Patient } from "@brightree-bridge/record-schema";
import { dateInput, maskedTextState } from "./controlState";
import type { FormFieldMap } from "./payload";

export const PATIENT_TEMPLATE = "patient-personal";

const CONTENT = "ctl00$ctl00$c$c$";
const CONTENT_ID = "ctl00_ctl00_c_c_";

function maskedField(control: string, value: string, mask: string): FormFieldMap {
  return {
    [`${CONTENT}${control}`]: value,
    [`${CONTENT_ID}${control.replace(/\$/g, "_")}_ClientState`]: maskedTextState(value, mask)
  };
}

/** Maps a validated patient onto the controls of the patient personal page. */
export function patientFields(patient: Patient, patientKey: string | null): FormFieldMap {
  const dob = dateInput(patient.dob);

  return {
    [`${CONTENT}txtLastName`]: patient.nameLast,
    [`${CONTENT}txtFirstName`]: patient.nameFirst,
    [`${CONTENT}txtMiddleName`]: patient.nameMiddle,
    [`${CONTENT}txtPreferredName`]: patient.namePreferred,
    [`${CONTENT}txtSuffix`]: patient.nameSuffix,
    [`${CONTENT}hmeDOB`]: dob.pickerValue,
    [`${CONTENT}hmeDOB$dateInput`]: dob.displayValue,
    [`${CONTENT_ID}hmeDOB_dateInput_ClientState`]: dob.state,
    ...maskedField("ssnControl$hmeSSN", patient.ssn, SSN_MASK),
    ...maskedField("hmePhone", patient.phoneHome, PHONE_MASK),
    ...maskedField("hmeFax", patient.phoneFax, PHONE_MASK),
    ...maskedField("hmeMobilePhone", patient.phoneMobile, PHONE_MASK),
    [`${CONTENT}txtEmailAddress`]: patient.email,
    ptKey: patientKey ?? ""
  };
}
