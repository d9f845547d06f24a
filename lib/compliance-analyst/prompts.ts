import type { ChatCompletionMessageParam } from "openai/resources/chat";
import { COMPLIANCE_SCOPE, PART_820_PREFIX, PART_820_REQUIREMENTS } from './configuration/compliance-scope';
import { DEFAULT_DETAIL_LEVEL } from './configuration/config';
import { DetailLevelEnum } from './enums/detail-level.enum';

const DETAIL_INSTRUCTIONS: Record<DetailLevelEnum, string> = {
  [DetailLevelEnum.BASIC]: 'Keep the analysis short: an overall verdict per framework and the most important gaps only.',
  [DetailLevelEnum.STANDARD]: 'For each framework give the verdict, the gaps you found with evidence from the document, and a recommendation per gap.',
  [DetailLevelEnum.COMPREHENSIVE]: 'Go through each framework section by section. Cite specific regulation subsections, quote the document as evidence, and include priority actions with estimated effort.',
};

export class Prompts {
  static complianceAnalysis(
    documentText: string,
    scope: readonly string[] = COMPLIANCE_SCOPE,
    detailLevel: DetailLevelEnum = DEFAULT_DETAIL_LEVEL
  ): ChatCompletionMessageParam[] {
    return [
      {
        role: "user",
        content: Prompts.complianceInstructions(documentText, scope, detailLevel)
      }
    ];
  }

  static complianceInstructions(
    documentText: string,
    scope: readonly string[],
    detailLevel: DetailLevelEnum
  ): string {
    const frameworks = scope.map((framework, index) => {
      const line = `${index + 1}. ${framework}`;
      if (!framework.startsWith(PART_820_PREFIX)) return line;
      const requirements = PART_820_REQUIREMENTS.map(requirement => `   - ${requirement}`).join('\n');
      return `${line}\n   Key requirements to verify:\n${requirements}`;
    }).join('\n');

    return `You are an FDA regulatory compliance analyst with extensive experience in medical device submissions and inspections.

Assess the medical device document below against each of these regulatory frameworks:
${frameworks}

SEVERITY CLASSIFICATION:
- CRITICAL: direct patient safety impact or a missing required system; likely FDA Warning Letter
- MAJOR: significant compliance gap; likely FDA 483 observation
- MINOR: documentation gap or improvement opportunity; low enforcement risk

ANALYSIS DEPTH (${detailLevel}):
${DETAIL_INSTRUCTIONS[detailLevel]}

Base every finding on the document text. When the document says nothing about a requirement, report that as a gap rather than assuming compliance. Finish with a short overall assessment.

DOCUMENT TO ANALYZE:
${documentText}`;
  }
}
