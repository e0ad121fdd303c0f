import { urNetProfile } from '../../src/extraction/profile';
import { ExtractedUnit, RecordClassifier } from '../../src/services/classifier';
import { FakeNode } from '../helpers/fakeDom';

const complete: ExtractedUnit = { layout: '2LDK', rent: '85,000円', floorArea: '55㎡', floorLevel: '3階' };

describe('RecordClassifier', () => {
  const strict = new RecordClassifier({ detail: urNetProfile.detail, completeRowImpliesVacancy: false });
  const lenient = new RecordClassifier({ detail: urNetProfile.detail, completeRowImpliesVacancy: true });

  describe('hasDetailAffordance', () => {
    it('should recognise a link labelled 詳細', async () => {
      const row = new FakeNode({ children: { a: [{ text: '間取図' }, { text: ' 詳細 ' }] } });
      expect(await strict.hasDetailAffordance(row)).toBe(true);
    });

    it('should recognise a link to a room page', async () => {
      const row = new FakeNode({ children: { a: [{ text: '→', attrs: { href: '/chintai/kanto/tokyo/room.html?id=20' } }] } });
      expect(await strict.hasDetailAffordance(row)).toBe(true);
    });

    it('should ignore unrelated links', async () => {
      const row = new FakeNode({ children: { a: [{ text: '地図', attrs: { href: '/map.html' } }] } });
      expect(await strict.hasDetailAffordance(row)).toBe(false);
    });
  });

  describe('isVacant', () => {
    const bare = new FakeNode({});

    it('should treat a complete row as vacant when the heuristic is on', async () => {
      expect(await lenient.isVacant(bare, complete)).toBe(true);
    });

    it('should require a detail link when the heuristic is off', async () => {
      expect(await strict.isVacant(bare, complete)).toBe(false);
    });

    it('should not treat a row missing its layout as vacant by heuristic', async () => {
      expect(await lenient.isVacant(bare, { ...complete, layout: null })).toBe(false);
    });
  });

  describe('toUnitRecord', () => {
    it('should fill missing area and floor with the sentinel', () => {
      expect(strict.toUnitRecord({ layout: '1K', rent: '55,000円', floorArea: null, floorLevel: null })).toEqual({
        layout: '1K',
        rent: '55,000円',
        floorArea: 'unknown',
        floorLevel: 'unknown',
      });
    });

    it('should drop rows without rent', () => {
      expect(strict.toUnitRecord({ ...complete, rent: null })).toBeNull();
    });

    it('should drop rows whose layout is the sentinel', () => {
      expect(strict.toUnitRecord({ ...complete, layout: 'unknown' })).toBeNull();
    });
  });

  describe('classify', () => {
    it('should return the record for a vacant complete row', async () => {
      const row = new FakeNode({ children: { a: [{ text: '詳細' }] } });
      expect(await strict.classify(row, complete)).toEqual({
        layout: '2LDK',
        rent: '85,000円',
        floorArea: '55㎡',
        floorLevel: '3階',
      });
    });

    it('should return null for an occupied row', async () => {
      expect(await strict.classify(new FakeNode({}), complete)).toBeNull();
    });

    it('should return null for an incomplete row even with a detail link', async () => {
      const row = new FakeNode({ children: { a: [{ text: '詳細' }] } });
      expect(await strict.classify(row, { ...complete, layout: null })).toBeNull();
    });
  });
});
