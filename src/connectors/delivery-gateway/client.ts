import type { AlertExportRecord, VocabularyEntry } from "../../modules/alert-export/types.js";
import { DeliveryGatewayError } from "./errors.js";
import { parseLoginToken, parseVocabularyPayload } from "./schema.js";
import type { DeliveryGateway, DeliveryGatewayClientOptions } from "./types.js";

function stripTrailingSlash(url: string): string {
  return url.endsWith("/") ? url.slice(0, -1) : url;
}

function requireNonEmpty(value: string, fieldName: string): string {
  if (!value || value.trim() === "") {
    throw new Error(`DeliveryGatewayClient requires a non-empty ${fieldName}`);
  }
  return value.trim();
}

export class DeliveryGatewayClient implements DeliveryGateway {
  private readonly baseUrl: string;
  private readonly dispatchBaseUrl: string;
  private readonly email: string;
  private readonly password: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  private token: string | undefined;

  constructor(options: DeliveryGatewayClientOptions) {
    this.baseUrl = stripTrailingSlash(requireNonEmpty(options.baseUrl, "baseUrl"));
    this.dispatchBaseUrl = stripTrailingSlash(
      requireNonEmpty(options.dispatchBaseUrl, "dispatchBaseUrl")
    );
    this.email = requireNonEmpty(options.email, "email");
    this.password = requireNonEmpty(options.password, "password");

    if (!Number.isInteger(options.requestTimeoutMs) || options.requestTimeoutMs <= 0) {
      throw new Error("requestTimeoutMs must be a positive integer");
    }
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async login(): Promise<void> {
    const response = await this.request("login", `${this.baseUrl}/users/login`, {
      method: "POST",
      headers: {
        accept: "application/json",
        "content-type": "application/json"
      },
      body: JSON.stringify({ email: this.email, password: this.password })
    });

    this.token = parseLoginToken(await response.json());
  }

  async fetchEvents(): Promise<VocabularyEntry[]> {
    const response = await this.request("fetch events", `${this.baseUrl}/events`, {
      method: "GET",
      headers: this.authorizedHeaders()
    });
    return parseVocabularyPayload(await response.json(), "events");
  }

  async fetchCities(): Promise<VocabularyEntry[]> {
    const response = await this.request("fetch cities", `${this.baseUrl}/cities`, {
      method: "GET",
      headers: this.authorizedHeaders()
    });
    return parseVocabularyPayload(await response.json(), "cities");
  }

  async importAlerts(records: readonly AlertExportRecord[]): Promise<string> {
    const response = await this.request("import alerts", `${this.baseUrl}/alerts/batch`, {
      method: "POST",
      headers: this.authorizedHeaders(),
      body: JSON.stringify({ alerts: records })
    });
    return response.text();
  }

  async startAlertDispatch(): Promise<void> {
    const response = await this.request("start alert dispatch", `${this.dispatchBaseUrl}/alerts/start`, {
      method: "POST",
      headers: { accept: "application/json" }
    });
    await response.text();
  }

  private authorizedHeaders(): Record<string, string> {
    if (!this.token) {
      throw new Error("Delivery gateway token missing; call login() first");
    }
    return {
      authorization: `Bearer ${this.token}`,
      accept: "application/json",
      "content-type": "application/json"
    };
  }

  private async request(
    operation: string,
    url: string,
    init: RequestInit
  ): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.requestTimeoutMs);

    try {
      const response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      if (!response.ok) {
        const body = await response.text();
        throw new DeliveryGatewayError(
          `Delivery gateway ${operation} failed (${response.status}): ${body}`,
          { operation, status: response.status, body }
        );
      }
      return response;
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new DeliveryGatewayError(
          `Delivery gateway ${operation} timed out after ${this.requestTimeoutMs}ms`,
          { operation, timedOut: true }
        );
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
