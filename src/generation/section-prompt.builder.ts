import { Injectable } from '@nestjs/common';
import { describeSection } from './section-types';

export const MAX_REFERENCE_CHUNKS = 5;
export const RC_SAMPLE_CHARS = 3000;

const NO_REFERENCES =
  'Aucune référence disponible. Génère du contenu basé sur les meilleures pratiques du BTP.';
const NO_RC_CONTEXT = 'Projet de construction (contexte non disponible)';

export interface ReferenceChunk {
  content: string;
  similarity: number;
  metadata: Record<string, unknown>;
}

/**
 * French prompts for section drafting and RC criteria extraction
 */
@Injectable()
export class SectionPromptBuilder {
  build(
    sectionType: string,
    rcContext: string | null,
    referenceChunks: ReferenceChunk[],
  ): string {
    const description = describeSection(sectionType);
    const references = this.formatReferences(referenceChunks);
    const rcText = rcContext ? rcContext : NO_RC_CONTEXT;

    return `Tu es un expert en rédaction de mémoires techniques pour le BTP (Bâtiment et Travaux Publics).

**Contexte du projet (extrait du Règlement de Consultation) :**
${rcText}

**Type de section à générer :** ${description}

**Contenu de référence (extraits de mémoires similaires) :**
${references}

**Instructions :**
1. Génère une section professionnelle de mémoire technique
2. Réutilise les informations factuelles des références (chiffres, méthodes, équipements, certifications)
3. Adapte le contenu au contexte spécifique du RC
4. Utilise un ton professionnel mais accessible
5. Privilégie les tableaux aux longues listes quand c'est pertinent
6. Structure : titre H2, sous-titres H3, paragraphes clairs
7. Utilise des bullet points pour les listes d'éléments

**Contraintes :**
- Format : Markdown
- Longueur : 500-1000 mots
- Ne pas inventer de données chiffrées, utiliser uniquement les références
- Si une information n'est pas dans les références, reste générique et professionnel
- Adapte les noms d'entreprise, projets, et dates au contexte du RC

Génère maintenant la section :`;
  }

  buildCriteriaPrompt(rcText: string): string {
    return `Analyse ce Règlement de Consultation et extrait les critères d'évaluation principaux du mémoire technique.

RC :
${rcText.slice(0, RC_SAMPLE_CHARS)}

Liste uniquement les 5-7 critères les plus importants, de manière concise.`;
  }

  formatReferences(referenceChunks: ReferenceChunk[]): string {
    if (referenceChunks.length === 0) {
      return NO_REFERENCES;
    }

    return [...referenceChunks]
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, MAX_REFERENCE_CHUNKS)
      .map((chunk, index) => {
        const filename = chunk.metadata.filename;
        const source =
          typeof filename === 'string' && filename ? filename : 'Unknown';
        return (
          `Extrait de référence ${index + 1} ` +
          `(similarité: ${chunk.similarity.toFixed(2)}, source: ${source}):\n` +
          chunk.content
        );
      })
      .join('\n\n---\n\n');
  }
}
