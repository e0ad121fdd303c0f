import { urNetProfile } from '../../src/extraction/profile';
import { findUnitRows, isUnitRowText } from '../../src/extraction/rows';
import { FakeNode } from '../helpers/fakeDom';

const strategy = urNetProfile.rows;

describe('rows', () => {
  describe('isUnitRowText', () => {
    it('should accept a row with a price and a room number', () => {
      expect(isUnitRowText('203号室 78,500円 2DK 48㎡ 2階', strategy)).toBe(true);
    });

    it('should accept a row with a price and only a layout code', () => {
      expect(isUnitRowText('1LDK 102,000円', strategy)).toBe(true);
    });

    it('should reject header rows', () => {
      expect(isUnitRowText('部屋名 家賃 間取り 床面積 階数 101号室 1,000円', strategy)).toBe(false);
    });

    it('should reject rows without a price', () => {
      expect(isUnitRowText('203号室 2DK 48㎡', strategy)).toBe(false);
    });

    it('should reject rows without an identifier', () => {
      expect(isUnitRowText('共益費 3,100円', strategy)).toBe(false);
    });

    it('should reject empty text', () => {
      expect(isUnitRowText('', strategy)).toBe(false);
    });
  });

  describe('findUnitRows', () => {
    it('should stop at the first selector with qualifying rows', async () => {
      const page = new FakeNode({
        children: {
          '.module_tables_room table tbody tr.js-log-item': [
            { text: '部屋名 家賃 間取り' },
          ],
          'table tbody tr.js-log-item': [
            { text: '101号室 85,000円 2LDK' },
            { text: '部屋名 家賃' },
            { text: '102号室 86,000円 2LDK' },
          ],
          tr: [{ text: '999号室 1,000円' }],
        },
      });

      const discovery = await findUnitRows(page, strategy);

      expect(discovery.selector).toBe('table tbody tr.js-log-item');
      expect(discovery.rows.map(row => row.text)).toEqual(['101号室 85,000円 2LDK', '102号室 86,000円 2LDK']);
    });

    it('should report no rows when nothing qualifies', async () => {
      const page = new FakeNode({ children: { tr: [{ text: 'お探しの条件に合う部屋はありません' }] } });

      expect(await findUnitRows(page, strategy)).toEqual({ rows: [], selector: null });
    });
  });
});
