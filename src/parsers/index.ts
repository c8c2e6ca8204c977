/**
 * Parsers for requirement lines and advisory catalogues.
 *
 * - Requirement files ("requirements.txt", "requirements/*.txt")
 * - Catalogue spec strings (">=1.0,<1.4.2")
 * - Catalogue documents (safety-db "insecure_full.json" layout)
 */

export { parseRequirementLine, parseRequirementLines } from "./requirements";
export { parseSpecString } from "./specs";
export { parseCatalogue, buildVulnerabilityRecords } from "./catalogue";
export { normalizeName, neutralBound, formatConstraint } from "./utils";
