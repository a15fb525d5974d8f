import { ENVIRONMENT_TYPE_COLUMN, SYSTEM_NAME_COLUMN } from "./schema";

export type EntityKind = "environment" | "database" | "server" | "url" | "cloud";

export const ENTITY_KINDS: readonly EntityKind[] = ["environment", "database", "server", "url", "cloud"];

/**
 * Everything that differs between the inventory types. The extraction,
 * analysis and report code is shared and reads these fields.
 */
export interface EntityProfile {
  kind: EntityKind;
  // Used in file names: {Client}_{label}_Data.xlsx, {Client}_{label}_Deviation_Analysis.xlsx
  label: string;
  displayName: string;
  sourceSheet: string;
  requiredColumns: string[];
  resultsSheet: string;
  verdictField: string;
  analystRole: string;
  extractorName: string;
  analyzerName: string;
}

const BASE_COLUMNS = [SYSTEM_NAME_COLUMN, ENVIRONMENT_TYPE_COLUMN];

export const ENTITY_PROFILES: Record<EntityKind, EntityProfile> = {
  environment: {
    kind: "environment",
    label: "Environment",
    displayName: "Environment Register",
    sourceSheet: "Environment_Register",
    requiredColumns: [...BASE_COLUMNS, "Env-ID"],
    resultsSheet: "Environment_Deviation_Analysis",
    verdictField: "Environment_DTAP",
    analystRole: "IT environment",
    extractorName: "Environment Data Extractor",
    analyzerName: "EnvironmentDeviationAnalyzer",
  },
  database: {
    kind: "database",
    label: "Database",
    displayName: "Database",
    sourceSheet: "Database_Inventory",
    requiredColumns: [...BASE_COLUMNS, "Database Instance"],
    resultsSheet: "Database_Deviation_Analysis",
    verdictField: "Database_Config",
    analystRole: "IT database instance",
    extractorName: "Database Data Extractor",
    analyzerName: "DatabaseDeviationAnalyzer",
  },
  server: {
    kind: "server",
    label: "Server",
    displayName: "Server",
    sourceSheet: "Server_Instance_Mapping",
    requiredColumns: [...BASE_COLUMNS, "Server/Instance ID", "Hostname"],
    resultsSheet: "Server_Deviation_Analysis",
    verdictField: "Server_Config",
    analystRole: "IT server infrastructure",
    extractorName: "Server Data Extractor",
    analyzerName: "ServerDeviationAnalyzer",
  },
  url: {
    kind: "url",
    label: "URL_Endpoint",
    displayName: "URL Endpoint",
    sourceSheet: "URL_Endpoint_Inventory",
    requiredColumns: [...BASE_COLUMNS, "URL"],
    resultsSheet: "URL_Endpoint_Deviation_Analysis",
    verdictField: "URL_Config",
    analystRole: "IT URL endpoint",
    extractorName: "URL Endpoint Extractor",
    analyzerName: "URLEndpointDeviationAnalyzer",
  },
  cloud: {
    kind: "cloud",
    label: "Cloud_Resource",
    displayName: "Cloud Resource",
    sourceSheet: "Cloud_Resource_Inventory",
    requiredColumns: [...BASE_COLUMNS, "Subscription ID", "Resource Group Name"],
    resultsSheet: "Cloud_Deviation_Analysis",
    verdictField: "Cloud_Config",
    analystRole: "IT cloud resource",
    extractorName: "Cloud Resource Extractor",
    analyzerName: "CloudResourceDeviationAnalyzer",
  },
};

// CLI process selectors
export const PROCESS_SELECTORS = ["env", "db", "server", "url", "cloud", "all"] as const;

export type ProcessSelector = (typeof PROCESS_SELECTORS)[number];

const SELECTOR_KINDS: Record<Exclude<ProcessSelector, "all">, EntityKind> = {
  env: "environment",
  db: "database",
  server: "server",
  url: "url",
  cloud: "cloud",
};

export function kindsForSelector(selector: ProcessSelector): EntityKind[] {
  if (selector === "all") return [...ENTITY_KINDS];
  return [SELECTOR_KINDS[selector]];
}

export function populationFileName(clientName: string, profile: EntityProfile): string {
  return `${clientName}_${profile.label}_Data.xlsx`;
}

export function reportFileName(clientName: string, profile: EntityProfile): string {
  return `${clientName}_${profile.label}_Deviation_Analysis.xlsx`;
}
