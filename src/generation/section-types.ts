/**
 * Memoir section types and what each one covers
 */
export const SECTION_TYPES = {
  presentation:
    "Présentation de l'entreprise (historique, chiffres clés, certifications)",
  organisation: 'Organisation du chantier (PIC, moyens, logistique)',
  methodologie: 'Méthodologie de réalisation (phasage, techniques)',
  moyens_humains: 'Moyens humains (organigramme, effectifs)',
  moyens_materiels: 'Moyens matériels (liste équipements, capacités)',
  planning: 'Planning prévisionnel (Gantt, délais)',
  environnement: 'Démarche environnementale (RSE, gestion des déchets)',
  securite: 'Sécurité et santé (PPSPS, mesures de prévention)',
  insertion: "Insertion sociale (heures d'insertion prévues)",
} as const;

export type SectionType = keyof typeof SECTION_TYPES;

export interface SectionTypeInfo {
  type: SectionType;
  title: string;
  description: string;
}

export function isSectionType(value: string): value is SectionType {
  return Object.prototype.hasOwnProperty.call(SECTION_TYPES, value);
}

/** `moyens_humains` → `Moyens Humains` */
export function titleCase(value: string): string {
  return value
    .replace(/_/g, ' ')
    .replace(
      /\p{L}+/gu,
      (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase(),
    );
}

export function describeSection(sectionType: string): string {
  return isSectionType(sectionType)
    ? SECTION_TYPES[sectionType]
    : titleCase(sectionType);
}

/**
 * Heading of a drafted section: the description without its parenthesised detail
 */
export function sectionTitle(sectionType: string): string {
  const description = describeSection(sectionType);
  const detail = description.indexOf(' (');
  return detail > 0 ? description.slice(0, detail) : description;
}

export function listSectionTypes(): SectionTypeInfo[] {
  return Object.entries(SECTION_TYPES).flatMap(([type, description]) =>
    isSectionType(type)
      ? [{ type, title: sectionTitle(type), description }]
      : [],
  );
}
