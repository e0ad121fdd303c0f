import { urNetProfile } from '../../src/extraction/profile';
import { RecordClassifier } from '../../src/services/classifier';
import { FieldExtractor } from '../../src/services/extractor';
import { FakePage, unitRow } from '../helpers/fakeDom';

const BODY = [
  '交通 東西線「門前仲町」駅 徒歩5分',
  '所在地 東京都江東区サンプル1-2-3',
  '電話: 03-1111-2222',
  '管理年数 12年',
].join('\n');

describe('FieldExtractor', () => {
  const extractor = new FieldExtractor(
    urNetProfile,
    new RecordClassifier({ detail: urNetProfile.detail, completeRowImpliesVacancy: false })
  );

  it('should extract name, vacant units and descriptive fields from the page', async () => {
    const page = new FakePage({
      title: 'サンプル団地（東京都）の賃貸物件｜UR賃貸住宅',
      text: BODY,
      children: {
        'table tbody tr.js-log-item': [
          unitRow({ layout: '2LDK', rent: '85,000', area: '55.5㎡', floor: '3階', link: true }),
          unitRow({ layout: '1K', rent: '61,000', area: '25㎡', floor: '1階' }),
        ],
      },
    });

    const result = await extractor.extract(page, { url: 'https://example.test/a', phone: '03-9999-0000' });

    expect(result).toEqual({
      url: 'https://example.test/a',
      name: 'サンプル団地',
      title: 'サンプル団地（東京都）の賃貸物件｜UR賃貸住宅',
      units: [{ layout: '2LDK', rent: '85,000円', floorArea: '55.5㎡', floorLevel: '3階' }],
      unitCount: 1,
      phone: '03-1111-2222',
      phoneSource: 'scraped',
      transportation: '交通 東西線「門前仲町」駅 徒歩5分',
      transportationSource: 'scraped',
      address: '東京都江東区サンプル1-2-3',
      addressSource: 'scraped',
      managementYears: '12年',
      managementYearsSource: 'scraped',
      status: 'success',
    });
  });

  it('should use predefined values without reading the page when all four are given', async () => {
    const page = new FakePage({
      title: 'ignored',
      text: BODY,
      children: { 'h1.property-name': [{ text: ' メゾン見本 ' }] },
    });

    const result = await extractor.extract(page, {
      url: 'https://example.test/b',
      name: 'Predefined Court',
      transportation: 'Line A',
      address: '1 Test Street',
      phone: '000-0000',
      managementYears: '5年',
    });

    expect(result.name).toBe('メゾン見本');
    expect(result.title).toBe('Predefined Court');
    expect(result.transportation).toBe('Line A');
    expect(result.transportationSource).toBe('predefined');
    expect(result.address).toBe('1 Test Street');
    expect(result.phone).toBe('000-0000');
    expect(result.managementYears).toBe('5年');
    expect(result.managementYearsSource).toBe('predefined');
  });

  it('should fall back to predefined values for fields the page lacks', async () => {
    const page = new FakePage({ text: '電話: 03-1111-2222' });

    const result = await extractor.extract(page, { url: 'https://example.test/c', name: '見本ハイツ', address: '2 Test Street' });

    expect(result.name).toBe('見本ハイツ');
    expect(result.phone).toBe('03-1111-2222');
    expect(result.phoneSource).toBe('scraped');
    expect(result.address).toBe('2 Test Street');
    expect(result.addressSource).toBe('predefined');
    expect(result.transportation).toBe('unknown');
    expect(result.transportationSource).toBe('unknown');
  });

  it('should produce sentinels for an empty page', async () => {
    const result = await extractor.extract(new FakePage({}), { url: 'https://example.test/d' });

    expect(result.name).toBe('unknown');
    expect(result.title).toBe('');
    expect(result.units).toEqual([]);
    expect(result.unitCount).toBe(0);
    expect(result.managementYears).toBe('unknown');
    expect(result.status).toBe('success');
  });
});
