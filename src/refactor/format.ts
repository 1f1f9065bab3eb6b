import type { ArtifactMetadata, FinalReport } from './types'

function wrapAsJSONCodeFence(obj: unknown): string {
  return '```json\n' + JSON.stringify(obj, null, 2) + '\n```'
}

export function artifactLabel(metadata: ArtifactMetadata): string {
  return metadata.url || metadata.filename || 'unknown'
}

function renderHuman(report: FinalReport): string {
  const rationale = report.rationalePerConcern.map((r) => `#### **${r.concern}**\n- ${r.rationale}`).join('\n\n')
  return [
    '## Code Refactor',
    `- Language: **${report.detectedLanguage}**`,
    `- File: **${artifactLabel(report.metadata)}**`,
    '',
    rationale,
    '',
    '### Refactored Code',
    '```' + report.detectedLanguage,
    report.finalText,
    '```',
    ''
  ].join('\n')
}

export function renderReport(report: FinalReport, structured: boolean): string {
  return structured ? wrapAsJSONCodeFence(report) : renderHuman(report)
}
