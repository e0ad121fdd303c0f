import { SiteProfile } from '../extraction/profile';
import { collapseWhitespace, resolveField, safeText } from '../extraction/resolve';
import { findUnitRows } from '../extraction/rows';
import { PropertyResult, Target, UNKNOWN, UnitRecord } from '../types/property';
import { RenderedPage } from '../types/renderer';
import { RecordClassifier } from './classifier';
import {
  DescriptiveField,
  FieldValue,
  hasCompletePredefinedInfo,
  predefinedValue,
  withFallback,
} from './results';

/**
 * Turns a rendered listing page into a property result.
 *
 * Every field is resolved independently through the profile's fallback
 * chain, so a missing or malformed element only costs that one field.
 */
export class FieldExtractor {
  constructor(
    private readonly profile: SiteProfile,
    private readonly classifier: RecordClassifier
  ) {}

  async extract(page: RenderedPage, target: Target): Promise<PropertyResult> {
    const pageTitle = await this.readTitle(page);
    const name = await this.extractName(page, pageTitle, target);
    const units = await this.extractUnits(page);
    const fields = await this.extractDescriptiveFields(page, target);

    return {
      url: target.url,
      name,
      title: predefinedValue(target, 'name') ?? pageTitle,
      units,
      unitCount: units.length,
      phone: fields.phone.value,
      phoneSource: fields.phone.source,
      transportation: fields.transportation.value,
      transportationSource: fields.transportation.source,
      address: fields.address.value,
      addressSource: fields.address.source,
      managementYears: fields.managementYears.value,
      managementYearsSource: fields.managementYears.source,
      status: 'success',
    };
  }

  /**
   * Property name: heading selectors, then the page title without the
   * site suffix, then the caller's name
   */
  async extractName(page: RenderedPage, pageTitle: string, target: Target): Promise<string> {
    const scraped = await resolveField(page, this.profile.name);
    if (scraped) return scraped;

    const fromTitle = this.profile.titleSuffix
      ? collapseWhitespace(pageTitle.replace(this.profile.titleSuffix, ''))
      : collapseWhitespace(pageTitle);
    if (fromTitle) return fromTitle;

    return predefinedValue(target, 'name') ?? UNKNOWN;
  }

  async extractUnits(page: RenderedPage): Promise<UnitRecord[]> {
    const { rows } = await findUnitRows(page, this.profile.rows);
    const units: UnitRecord[] = [];

    for (const row of rows) {
      const extracted = {
        layout: await resolveField(row.node, this.profile.unit.layout, row.text),
        rent: await resolveField(row.node, this.profile.unit.rent, row.text),
        floorArea: await resolveField(row.node, this.profile.unit.floorArea, row.text),
        floorLevel: await resolveField(row.node, this.profile.unit.floorLevel, row.text),
      };

      const record = await this.classifier.classify(row.node, extracted);
      if (record) units.push(record);
    }

    return units;
  }

  /**
   * Transportation, address, phone and management years. When the caller
   * supplied all four, the page is not consulted at all.
   */
  async extractDescriptiveFields(
    page: RenderedPage,
    target: Target
  ): Promise<Record<DescriptiveField, FieldValue>> {
    if (hasCompletePredefinedInfo(target)) {
      return {
        transportation: withFallback(target, 'transportation', null),
        address: withFallback(target, 'address', null),
        phone: withFallback(target, 'phone', null),
        managementYears: withFallback(target, 'managementYears', null),
      };
    }

    const bodyText = await safeText(page);
    const resolve = async (field: DescriptiveField): Promise<FieldValue> =>
      withFallback(target, field, await resolveField(page, this.profile[field], bodyText));

    return {
      transportation: await resolve('transportation'),
      address: await resolve('address'),
      phone: await resolve('phone'),
      managementYears: await resolve('managementYears'),
    };
  }

  private async readTitle(page: RenderedPage): Promise<string> {
    try {
      return collapseWhitespace(await page.title());
    } catch {
      return '';
    }
  }
}
