import {
  BasePatientSchema,
  SalesOrderSchema,
  loadTemplate,
  type FormTemplate,
  type PatientInput,
  type SalesOrderInput
} from "@brightree-bridge/record-schema";
import { env } from "./env";
import { IntegrationApiError, IntegrationAuthError } from "./errors";
import { buildFormBody } from "./forms/payload";
import { PATIENT_TEMPLATE, patientFields } from "./forms/patientForm";
import { SALES_ORDER_TEMPLATE, SALES_ORDER_TYPE_CODES, salesOrderFields } from "./forms/salesOrderForm";
import { PortalHttp } from "./http/portalHttp";
import { FetchTransport, type FetchLike, type Logger, type NetworkRequester } from "./http/transport";
import { CacheBuster, resolveInternalKey } from "./keyLookup";
import { takeSnapshot } from "./pageState";
import { findLabeledValue, parsePatientSections, type PatientSections } from "./patientView";
import { parsePostbackRedirect } from "./postback";
import { createSessionContext, type SessionContext } from "./session";

export type OperationName = "createOrUpdatePatient" | "searchPatient" | "createSalesOrder";

export type OperationState =
  | "FetchingPage"
  | "BuildingPayload"
  | "Posting"
  | "ParsingRedirect"
  | "FetchingResult"
  | "ExtractingResult"
  | "Done"
  | "Failed";

export type StateListener = (operation: OperationName, state: OperationState) => void;

export type BrightreeIntegrationOptions = {
  baseUrl?: string;
  tenantPath?: string;
  userAgent?: string;
  maxRedirects?: number;
  templateDir?: string;
  debug?: boolean;
  fetch?: FetchLike;
  logger?: Logger;
  now?: () => number;
  onStateChange?: StateListener;
};

export type NotFoundResult = { status: "not_found"; message: string };
export type PatientSaveResult = { status: "saved"; identifier: string; resultPageUrl: string };
export type PatientSearchResult = { status: "found"; sections: PatientSections };
export type SalesOrderResult = { status: "created"; orderKey: string; orderPageUrl: string };

export const NEW_PATIENT_ID = 0;
export const PATIENT_ID_LABEL = "Patient ID";

const PATIENT_PAGE_PATH = "/Patient/frmPatientPersonal.aspx";
const LOOKUP_PATH = "/Handlers/ComboBoxHandler.ashx";

function notFound(identifier: number | string): NotFoundResult {
  return {
    status: "not_found",
    message: `Unable to retrieve patient key for patient ID ${identifier}`
  };
}

export class BrightreeIntegration {
  private readonly baseUrl: string;
  private readonly tenantPath: string;
  private readonly userAgent: string;
  private readonly templateDir: string;
  private readonly debug: boolean;
  private readonly logger: Logger;
  private readonly transport: FetchTransport;
  private readonly cacheBuster: CacheBuster;
  private readonly onStateChange?: StateListener;
  private readonly templates = new Map<string, FormTemplate>();

  private session: SessionContext | null = null;
  private http: PortalHttp | null = null;

  constructor(options: BrightreeIntegrationOptions = {}) {
    this.baseUrl = options.baseUrl ?? env.baseUrl;
    this.tenantPath = options.tenantPath ?? env.tenantPath;
    this.userAgent = options.userAgent ?? env.userAgent;
    this.templateDir = options.templateDir ?? env.templateDir;
    this.debug = options.debug ?? env.debug;
    this.logger = options.logger ?? console;
    this.transport = new FetchTransport(options.maxRedirects ?? env.maxRedirects, options.fetch, this.logger);
    this.cacheBuster = new CacheBuster(options.now);
    this.onStateChange = options.onStateChange;
  }

  async initialize(tokens: string, networkRequester?: NetworkRequester): Promise<void> {
    this.session = createSessionContext(tokens, this.baseUrl, this.userAgent);
    this.http = new PortalHttp(this.transport, networkRequester);
  }

  async createOrUpdatePatient(input: PatientInput): Promise<PatientSaveResult | NotFoundResult> {
    const patient = BasePatientSchema.parse(input);

    return this.run("createOrUpdatePatient", async (enter) => {
      const { session, http } = this.connection();
      let patientKey: string | null = null;

      if (patient.patientId !== NEW_PATIENT_ID) {
        patientKey = await this.resolveInternalKey(patient.patientId);
        if (!patientKey) return notFound(patient.patientId);
      }

      const template = this.template(PATIENT_TEMPLATE);
      const pageUrl = this.pageUrl(template.path, { PatientKey: patientKey ?? "0", Edit: "1" });

      enter("FetchingPage");
      const page = await this.fetchInitialPage(pageUrl);

      enter("BuildingPayload");
      const body = buildFormBody(template, takeSnapshot(page), patientFields(patient, patientKey));

      enter("Posting");
      const response = await http.request("POST", pageUrl, { headers: this.postbackHeaders(session), body });

      enter("ParsingRedirect");
      const resultUrl = parsePostbackRedirect(response, "patientSave", session.origin);

      enter("FetchingResult");
      const resultPage = await http.request("GET", resultUrl.toString(), { headers: { ...session.headers } });

      enter("ExtractingResult");
      const identifier = findLabeledValue(resultPage, PATIENT_ID_LABEL);
      if (!identifier) {
        throw new IntegrationApiError(`${PATIENT_ID_LABEL} not found on result page`, undefined, {
          url: resultUrl.toString()
        });
      }

      return { status: "saved", identifier, resultPageUrl: resultUrl.toString() };
    });
  }

  async searchPatient(identifier: number | string): Promise<PatientSearchResult | NotFoundResult> {
    return this.run("searchPatient", async (enter) => {
      const patientKey = await this.resolveInternalKey(identifier);
      if (!patientKey) return notFound(identifier);

      enter("FetchingPage");
      const page = await this.fetchInitialPage(this.pageUrl(PATIENT_PAGE_PATH, { PatientKey: patientKey }));

      enter("ExtractingResult");
      return { status: "found", sections: parsePatientSections(page) };
    });
  }

  async createSalesOrder(input: SalesOrderInput): Promise<SalesOrderResult | NotFoundResult> {
    const order = SalesOrderSchema.parse(input);

    return this.run("createSalesOrder", async (enter) => {
      const { session, http } = this.connection();

      const patientKey = await this.resolveInternalKey(order.patientId);
      if (!patientKey) return notFound(order.patientId);

      const template = this.template(SALES_ORDER_TEMPLATE);
      const pageUrl = this.pageUrl(template.path, {
        SalesOrderKey: "0",
        PatientKey: patientKey,
        SOType: SALES_ORDER_TYPE_CODES[order.orderType]
      });

      enter("FetchingPage");
      const page = await this.fetchInitialPage(pageUrl);

      enter("BuildingPayload");
      const body = buildFormBody(template, takeSnapshot(page), salesOrderFields(order, patientKey));

      enter("Posting");
      const response = await http.request("POST", pageUrl, { headers: this.postbackHeaders(session), body });

      enter("ParsingRedirect");
      const orderUrl = parsePostbackRedirect(response, "salesOrderSave", session.origin);

      enter("ExtractingResult");
      const orderKey = orderUrl.searchParams.get("SalesOrderKey");
      if (!orderKey || orderKey === "0") {
        throw new IntegrationApiError("SalesOrderKey missing from redirect", undefined, {
          url: orderUrl.toString()
        });
      }

      return { status: "created", orderKey, orderPageUrl: orderUrl.toString() };
    });
  }

  /** Portal patient key for a business patient ID, or null when the portal has none. */
  async resolveInternalKey(identifier: number | string): Promise<string | null> {
    const { session, http } = this.connection();
    return resolveInternalKey(
      http,
      `${session.origin}${this.tenantPath}${LOOKUP_PATH}`,
      { ...session.headers },
      identifier,
      this.cacheBuster
    );
  }

  private async run<T>(
    operation: OperationName,
    body: (enter: (state: OperationState) => void) => Promise<T>
  ): Promise<T> {
    const enter = (state: OperationState) => {
      if (this.debug) {
        this.logger.log(`[brightree] ${operation}: ${state}`);
      }
      this.onStateChange?.(operation, state);
    };

    try {
      const result = await body(enter);
      enter("Done");
      return result;
    } catch (error) {
      enter("Failed");
      this.logger.error(
        `[brightree] ${operation} failed: ${error instanceof Error ? error.message : String(error)}`
      );
      throw error;
    }
  }

  private connection(): { session: SessionContext; http: PortalHttp } {
    if (!this.session || !this.http) {
      throw new Error("BrightreeIntegration.initialize() must be called before any operation");
    }
    return { session: this.session, http: this.http };
  }

  private template(page: string): FormTemplate {
    let template = this.templates.get(page);
    if (!template) {
      template = loadTemplate(this.templateDir, page);
      this.templates.set(page, template);
    }
    return template;
  }

  private pageUrl(pagePath: string, params: Record<string, string>): string {
    const { session } = this.connection();
    const url = new URL(`${this.tenantPath}${pagePath}`, session.origin);
    for (const [name, value] of Object.entries(params)) {
      url.searchParams.set(name, value);
    }
    return url.toString();
  }

  // A 404 on the first page of an operation means the session tokens have expired.
  private async fetchInitialPage(url: string): Promise<string> {
    const { session, http } = this.connection();
    try {
      return await http.request("GET", url, { headers: { ...session.headers } });
    } catch (error) {
      if (error instanceof IntegrationAuthError && error.statusCode === 404) {
        throw new IntegrationAuthError("Session tokens expired", 404);
      }
      throw error;
    }
  }

  private postbackHeaders(session: SessionContext): Record<string, string> {
    return {
      ...session.headers,
      "X-MicrosoftAjax": "Delta=true",
      "Content-Type": "application/x-www-form-urlencoded; charset=utf-8"
    };
  }
}
