import type { EntityProfile } from "@shared/entities";
import { describeMissingStages } from "@shared/environmentMapping";
import { toPromptRow, type SystemSummary } from "@shared/schema";

export function buildSystemPrompt(profile: EntityProfile): string {
  return `You are an expert ${profile.analystRole} analyst specializing in compliance and environment validation.
Your task is to analyze system environments and identify deviations from the required environment setup.`;
}

function example(profile: EntityProfile, systemName: string, verdict: string, reason: string): string {
  return JSON.stringify({ System_Name: systemName, [profile.verdictField]: verdict, Reason: reason });
}

/**
 * Classification instructions for one batch. The rows are embedded as a JSON
 * array of summaries; the reply must be a bare JSON array with exactly
 * System_Name, the profile's verdict field and Reason per system.
 */
export function buildClassificationPrompt(profile: EntityProfile, rows: SystemSummary[]): string {
  const data = JSON.stringify(rows.map(toPromptRow));
  const field = profile.verdictField;
  const okReason = describeMissingStages([]);

  return `You are an expert in ${profile.analystRole} environment analysis. Analyze the following ${profile.displayName.toLowerCase()} data:

${data}

TASK:
For each System Name, check ONLY if it has all three required environments: DEV, TEST, and PROD.

INSTRUCTIONS:
1. For each system, look at the boolean fields 'Has DEV', 'Has TEST', and 'Has PROD'.
2. If all three are true, mark the system as "OK" with reason "${okReason}".
3. If any are false, mark it as "Deviation" with the reason "No [ENVIRONMENT] environment available".
4. If multiple environments are missing, list all missing environments in the reason, joined with "and".

REQUIRED OUTPUT FORMAT:
A JSON array containing one object for each System Name, with these exact fields:
- System_Name: The system name
- ${field}: Either "Deviation" or "OK"
- Reason: The reason for deviation, or "${okReason}" if OK

EXAMPLES:
1. All environments present (Has DEV=true, Has TEST=true, Has PROD=true):
   ${example(profile, "Payroll Core", "OK", okReason)}

2. TEST missing (Has DEV=true, Has TEST=false, Has PROD=true):
   ${example(profile, "Ledger Hub", "Deviation", describeMissingStages(["TEST"]))}

3. DEV and TEST missing (Has DEV=false, Has TEST=false, Has PROD=true):
   ${example(profile, "Invoice Gateway", "Deviation", describeMissingStages(["DEV", "TEST"]))}

CRITICAL:
- Focus ONLY on the presence of environment types (DEV, TEST, PROD)
- Analyze EVERY System Name in the input data
- Return ONLY the JSON array with no additional text`;
}
