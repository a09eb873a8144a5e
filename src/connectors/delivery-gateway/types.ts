import type { AlertExportRecord, VocabularyEntry } from "../../modules/alert-export/types.js";

export interface DeliveryGateway {
  login(): Promise<void>;
  fetchEvents(): Promise<VocabularyEntry[]>;
  fetchCities(): Promise<VocabularyEntry[]>;
  importAlerts(records: readonly AlertExportRecord[]): Promise<string>;
  startAlertDispatch(): Promise<void>;
}

export interface DeliveryGatewayClientOptions {
  baseUrl: string;
  dispatchBaseUrl: string;
  email: string;
  password: string;
  requestTimeoutMs: number;
  fetchImpl?: typeof fetch;
}
