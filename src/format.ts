import type { CaseAnalysis, LawStatistics, LegalMapping, LegalSection } from './types.js';

export function bailableLabel(bailable: boolean | null): string {
  if (bailable === null) {
    return 'See statute';
  }
  return bailable ? 'Bailable' : 'Non-bailable';
}

export function formatSection(section: LegalSection): string {
  return `# ${section.code} ${section.sectionNumber}: ${section.title}

**Punishment**: ${section.punishment ?? 'See description'}
**Bailable**: ${bailableLabel(section.bailable)}

## Description

${section.description}`;
}

export function formatMapping(mapping: LegalMapping, newSection: LegalSection | null = null): string {
  let response = `# ${mapping.oldCode} ${mapping.oldSection} -> ${mapping.newCode} ${mapping.newSection}

**Status**: ${mapping.status}`;
  if (newSection) {
    response += `\n**${newSection.code} title**: ${newSection.title}`;
  }
  return response;
}

export function formatSectionList(code: string, sections: LegalSection[]): string {
  let response = `# ${code} Sections\n\n`;
  for (const section of sections) {
    response += `- **${section.code} ${section.sectionNumber}**: ${section.title}\n`;
  }
  return response;
}

export function formatAnalysis(analysis: CaseAnalysis): string {
  let response = `# Case Analysis\n\n## Summary\n\n${analysis.summary}\n\n`;

  response += `## Relevant Sections (${analysis.relevantSections.length})\n\n`;
  if (analysis.relevantSections.length === 0) {
    response += 'No matching sections.\n';
  }
  for (const section of analysis.relevantSections) {
    response += `- **${section.code} ${section.sectionNumber}**: ${section.title} (${bailableLabel(section.bailable)})\n`;
  }

  if (analysis.ipcToBnsMapping.length > 0) {
    response += '\n## IPC to BNS Mapping\n\n';
    for (const mapping of analysis.ipcToBnsMapping) {
      response += `- ${mapping.ipc} -> ${mapping.bns} (${mapping.status})\n`;
    }
  }

  response += `\n---\n**Disclaimer**: ${analysis.disclaimer}`;
  return response;
}

export function formatStatistics(stats: LawStatistics): string {
  let response = '# Indian Penal Law Database Statistics\n\n';
  for (const [code, count] of Object.entries(stats.sectionCounts)) {
    response += `- **${code} Sections**: ${count}\n`;
  }
  response += `- **IPC to BNS Mappings**: ${stats.mappingCount}\n`;
  response += `- **Loaded At**: ${stats.loadedAt}\n\n`;
  response += 'Statute tables are bundled with the server and held in memory.';
  return response;
}
