import type { AxiosInstance, AxiosRequestConfig } from "axios";
import type { Logger } from "pino";
import { z } from "zod";
import type { CrmConfig } from "../config";
import { ExternalServiceError, errorMessage } from "../errors";
import { requestResponseWithRetry, requestWithRetry, type RetryPolicy } from "../client/http";
import type { CrmCasePayload, CrmPersonPayload } from "./mapping";

/** Operations available while authenticated; only valid inside `withSession`. */
export interface CrmSession {
  findCaseByExternalRef(externalRef: string): Promise<string | null>;
  createCase(payload: CrmCasePayload): Promise<string>;
  findPerson(caseId: string, sequence: number): Promise<string | null>;
  createPerson(caseId: string, payload: CrmPersonPayload): Promise<string>;
}

export interface CrmGateway {
  withSession<T>(work: (session: CrmSession) => Promise<T>): Promise<T>;
}

const loginResponseSchema = z.object({
  Code: z.number(),
  Message: z.string().nullish(),
});

const entityListSchema = z.object({
  value: z.array(z.object({ Id: z.string() })),
});

const createdEntitySchema = z.object({
  Id: z.string(),
});

const NO_RETRY: RetryPolicy = { retryCount: 0, retryBackoffMs: 0 };

export function odataString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function parseOrThrow<T>(schema: z.ZodType<T>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ExternalServiceError("crm", `unexpected ${what} response: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function cookieHeaderFrom(setCookie: string[] | undefined): { cookie: string; csrf: string | null } {
  const pairs = (setCookie ?? [])
    .map((entry) => entry.split(";")[0]?.trim() ?? "")
    .filter((pair) => pair.includes("="));
  const csrfPair = pairs.find((pair) => pair.startsWith("BPMCSRF="));

  return {
    cookie: pairs.join("; "),
    csrf: csrfPair ? csrfPair.slice("BPMCSRF=".length) : null,
  };
}

/**
 * Creatio-style CRM: cookie session from AuthService, entities over OData 4.
 * Sessions are opened per call to `withSession` and always logged out.
 */
export class CreatioCrmGateway implements CrmGateway {
  constructor(
    private readonly config: CrmConfig,
    private readonly http: AxiosInstance,
    private readonly policy: RetryPolicy,
    private readonly logger: Logger,
  ) {}

  async withSession<T>(work: (session: CrmSession) => Promise<T>): Promise<T> {
    const headers = await this.login();
    try {
      return await work(this.bindSession(headers));
    } finally {
      await this.logout(headers);
    }
  }

  private async login(): Promise<Record<string, string>> {
    const response = await requestResponseWithRetry<unknown>({
      http: this.http,
      policy: this.policy,
      logger: this.logger,
      service: "crm",
      request: {
        method: "POST",
        url: `${this.config.baseUrl}/ServiceModel/AuthService.svc/Login`,
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        data: { UserName: this.config.username, UserPassword: this.config.password },
      },
    });

    const body = parseOrThrow(loginResponseSchema, response.data, "login");
    if (body.Code !== 0) {
      throw new ExternalServiceError("crm", `login rejected: ${body.Message ?? "unknown reason"}`, 401);
    }

    const { cookie, csrf } = cookieHeaderFrom(response.headers["set-cookie"]);
    const headers: Record<string, string> = {
      Accept: "application/json",
      "Content-Type": "application/json",
      ForceUseSession: "true",
      Cookie: cookie,
    };
    if (csrf) {
      headers.BPMCSRF = csrf;
    }
    return headers;
  }

  private async logout(headers: Record<string, string>): Promise<void> {
    try {
      await this.http.request({
        method: "POST",
        url: `${this.config.baseUrl}/ServiceModel/AuthService.svc/Logout`,
        headers,
        data: {},
      });
    } catch (error) {
      // Logout failures are only logged.
      this.logger.warn({ err: errorMessage(error) }, "CRM logout failed");
    }
  }

  private bindSession(headers: Record<string, string>): CrmSession {
    const entityUrl = (entity: string): string => `${this.config.baseUrl}/0/odata/${entity}`;

    const read = async (entity: string, filter: string): Promise<string | null> => {
      const data = await this.send({
        method: "GET",
        url: entityUrl(entity),
        headers,
        params: { $filter: filter, $select: "Id", $top: 1 },
      }, this.policy);
      const list = parseOrThrow(entityListSchema, data, `${entity} query`);
      return list.value[0]?.Id ?? null;
    };

    // Creates are not retried here: the caller looks up before creating again.
    const create = async (entity: string, payload: object): Promise<string> => {
      const data = await this.send({
        method: "POST",
        url: entityUrl(entity),
        headers,
        data: payload,
      }, NO_RETRY);
      return parseOrThrow(createdEntitySchema, data, `${entity} create`).Id;
    };

    return {
      findCaseByExternalRef: (externalRef) =>
        read(this.config.caseEntity, `ExternalRef eq ${odataString(externalRef)}`),
      createCase: (payload) => create(this.config.caseEntity, payload),
      findPerson: (caseId, sequence) =>
        read(this.config.personEntity, `CaseId eq ${odataString(caseId)} and Sequence eq ${sequence}`),
      createPerson: (caseId, payload) =>
        create(this.config.personEntity, { CaseId: caseId, ...payload }),
    };
  }

  private send(request: AxiosRequestConfig, policy: RetryPolicy): Promise<unknown> {
    return requestWithRetry<unknown>({
      http: this.http,
      policy,
      logger: this.logger,
      service: "crm",
      request,
    });
  }
}
