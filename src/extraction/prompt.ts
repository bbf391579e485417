/**
 * Journal Metadata Prompt
 *
 * Template variables to replace:
 * - {{journalName}}
 *
 * The response parser reads the four labelled lines requested at the end;
 * keep the labels in sync with responseParser.ts.
 */

export const JOURNAL_METADATA_PROMPT = `For the academic journal '{{journalName}}', provide:
1. The article processing charge (APC) in USD, EUR, or GBP if available, or 'None' if not found.
2. The publication frequency (e.g., monthly, quarterly, annual, or number of issues per year), or 'None' if not found.
3. Whether the journal is open access (answer 'Yes', 'No', or 'Unknown').
4. Whether the journal is hybrid (answer 'Yes', 'No', or 'Unknown').
Respond in the format:
APC: <value>
Frequency: <value>
Open Access: <Yes/No/Unknown>
Hybrid: <Yes/No/Unknown>`;

export function buildExtractionPrompt(journalName: string): string {
  return JOURNAL_METADATA_PROMPT.replace('{{journalName}}', journalName);
}
