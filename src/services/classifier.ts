import { DetailAffordance } from '../extraction/profile';
import { safeAttribute, safeQueryAll, safeText } from '../extraction/resolve';
import { DomNode } from '../types/renderer';
import { UNKNOWN, UnitRecord } from '../types/property';

/**
 * Unit fields as extracted from one row; null means the field was not found
 */
export interface ExtractedUnit {
  layout: string | null;
  rent: string | null;
  floorArea: string | null;
  floorLevel: string | null;
}

export interface VacancyRules {
  detail: DetailAffordance;
  /**
   * Treat a row that renders both a rent and a layout as vacant even
   * without a detail link. Matches listing sites that only render full
   * commercial data for available rooms; turn off for sites that also
   * list occupied rooms with prices.
   */
  completeRowImpliesVacancy: boolean;
}

/**
 * Decides which extracted rows are available units
 */
export class RecordClassifier {
  constructor(private readonly rules: VacancyRules) {}

  /**
   * Whether the row links to a room detail page
   */
  async hasDetailAffordance(row: DomNode): Promise<boolean> {
    const { linkSelector, textMarkers, hrefMarkers } = this.rules.detail;
    const links = await safeQueryAll(row, linkSelector);

    for (const link of links) {
      const text = await safeText(link);
      if (textMarkers.some(marker => text.includes(marker))) return true;

      const href = await safeAttribute(link, 'href');
      if (hrefMarkers.some(marker => href.includes(marker))) return true;
    }

    return false;
  }

  async isVacant(row: DomNode, unit: ExtractedUnit): Promise<boolean> {
    if (await this.hasDetailAffordance(row)) return true;
    return this.rules.completeRowImpliesVacancy && Boolean(unit.rent && unit.layout);
  }

  /**
   * Build a unit record, or null when layout or rent is missing.
   * Partial rows are dropped rather than counted with placeholders.
   */
  toUnitRecord(unit: ExtractedUnit): UnitRecord | null {
    if (!unit.layout || !unit.rent || unit.layout === UNKNOWN || unit.rent === UNKNOWN) {
      return null;
    }

    return {
      layout: unit.layout,
      rent: unit.rent,
      floorArea: unit.floorArea || UNKNOWN,
      floorLevel: unit.floorLevel || UNKNOWN,
    };
  }

  /**
   * Classify a row and, when vacant and complete, return its unit record
   */
  async classify(row: DomNode, unit: ExtractedUnit): Promise<UnitRecord | null> {
    const record = this.toUnitRecord(unit);
    if (!record) return null;
    return (await this.isVacant(row, unit)) ? record : null;
  }
}
