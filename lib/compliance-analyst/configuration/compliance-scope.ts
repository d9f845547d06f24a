/**
 * Regulatory frameworks every document is assessed against. Plain prose that
 * goes into the prompt as-is; nothing in the code interprets it.
 */
export const COMPLIANCE_SCOPE: readonly string[] = [
  '21 CFR Part 820 (Quality System Regulation): design controls, document controls, purchasing, production and process controls, CAPA, device history and quality records',
  '21 CFR Part 11 (Electronic Records; Electronic Signatures): system validation, audit trails, record retention, signature manifestation and controls',
  'ISO 13485 (Medical devices - Quality management systems): QMS documentation, management responsibility, risk-based approach, product realization, measurement and improvement',
  'device classification rules: Class I, II or III determination under 21 CFR Parts 860-892, product code and regulation number, applicable special controls',
  '510(k)/PMA submission requirements: predicate device and substantial equivalence, performance data, labeling, clinical evidence and premarket approval content',
];

export const PART_820_PREFIX = '21 CFR Part 820';

/**
 * Subsection requirements listed under the Part 820 framework, each with the
 * key elements the document should show.
 */
export const PART_820_REQUIREMENTS: readonly string[] = [
  '820.70(a) Production and process controls, general: written procedures that define and control production processes, keep devices within specification, monitor process parameters and ensure the procedures are followed',
  '820.70(b) Production and process changes: changes reviewed and approved before implementation, impact on specifications assessed, change control documented, validation where required',
  '820.70(c) Environmental control: environmental conditions controlled where necessary, monitoring procedures, defined action limits, documented controls',
  '820.70(d) Personnel: staff qualified for assigned tasks, training documented, competency demonstrated, hygiene practices established',
  '820.70(e) Contamination control: procedures preventing contamination, cleaning and sanitization protocols, sterility maintained where required',
  '820.70(f) Buildings: building design suitable for the operations, adequate space, orderly storage and handling, maintained facilities',
  '820.70(g) Equipment: equipment suitable for its use, calibration and maintenance schedules, documented adjustment and inspection, qualification where needed',
  '820.70(h) Manufacturing material: material handling procedures, material identified and controlled, appropriate storage conditions, traceability',
  '820.70(i) Automated processes: automated processes and their software validated, output quality ensured, change control for automation',
  '820.75(a) Process validation, general: processes whose results cannot be fully verified by inspection and test are validated to a high degree of assurance under an approved, documented protocol',
  '820.75(b) Validation activities: performed by qualified personnel, protocol sets methods and acceptance criteria, results documented and approved, revalidation when required',
  '820.80(a) Acceptance activities, general: written acceptance procedures, acceptance criteria established, activities documented, release authorization',
  '820.80(b) Receiving acceptance: incoming product inspected or tested, acceptance status documented, supplier evaluation, nonconforming product identified',
  '820.80(c) In-process acceptance: in-process inspections and tests, process parameters monitored, acceptance documented at specified stages, product identification maintained',
  '820.80(d) Final acceptance: final inspection and testing, complete device history record review before release, release authorization documented',
  '820.80(e) Acceptance records: records identify the inspector or tester, the date, the results and a clear accept or reject decision',
];
