import type { SalesOrder, SalesOrderType } from "@brightree-bridge/record-schema";
import { dateInput, textBoxState, type DateInputValue } from "./controlState";
import type { FormFieldMap } from "./payload";

export const SALES_ORDER_TEMPLATE = "sales-order-new";

export const SALES_ORDER_TYPE_CODES: Record<SalesOrderType, string> = {
  standard: "1",
  pickup_exchange: "2"
};

const CONTENT = "ctl00$ctl00$c$c$";
const CONTENT_ID = "ctl00_ctl00_c_c_";

function pickerFields(control: string, value: DateInputValue): FormFieldMap {
  return {
    [`${CONTENT}${control}`]: value.pickerValue,
    [`${CONTENT}${control}$dateInput`]: value.displayValue,
    [`${CONTENT_ID}${control}_dateInput_ClientState`]: value.state
  };
}

export function salesOrderFields(order: SalesOrder, patientKey: string): FormFieldMap {
  const fields: FormFieldMap = {
    [`${CONTENT}hfPatientKey`]: patientKey,
    [`${CONTENT}ddlSOType`]: SALES_ORDER_TYPE_CODES[order.orderType],
    [`${CONTENT}txtReferenceNumber`]: order.referenceNumber,
    ...pickerFields("rdpSODate", dateInput(order.orderDate)),
    ...pickerFields(
      "rdtpScheduledDelivery",
      dateInput(order.scheduledDeliveryDate, order.scheduledDeliveryTime)
    ),
    [`${CONTENT}txtNotes`]: order.notes,
    [`${CONTENT_ID}txtNotes_ClientState`]: textBoxState(order.notes),
    ptKey: patientKey
  };

  if (order.branchKey) {
    fields[`${CONTENT}ddlBranch`] = order.branchKey;
  }
  if (order.placeOfService) {
    fields[`${CONTENT}ddlPOS`] = order.placeOfService;
  }

  return fields;
}
