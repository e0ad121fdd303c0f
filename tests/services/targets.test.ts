import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
  loadTargets,
  parseTargetsFromCsv,
  parseUrlsFromText,
  targetSourceForFile,
  targetsFromUrls,
} from '../../src/services/targets';

const URL_PATTERN = /https?:\/\/www\.ur-net\.go\.jp\/[^\s,"]+/g;

describe('targets', () => {
  describe('targetsFromUrls', () => {
    it('should keep http(s) URLs once each, in order', () => {
      expect(
        targetsFromUrls([
          ' https://example.test/a ',
          'ftp://example.test/b',
          'https://example.test/c',
          'https://example.test/a',
        ])
      ).toEqual([{ url: 'https://example.test/a' }, { url: 'https://example.test/c' }]);
    });
  });

  describe('parseUrlsFromText', () => {
    it('should find every listing URL in free text', () => {
      const text = [
        'Candidates:',
        'https://www.ur-net.go.jp/chintai/kanto/tokyo/20_1234.html, near the station',
        'see also "https://www.ur-net.go.jp/chintai/kanto/tokyo/20_5678.html"',
        'https://other.example.test/ignored.html',
        'https://www.ur-net.go.jp/chintai/kanto/tokyo/20_1234.html',
      ].join('\n');

      expect(parseUrlsFromText(text, URL_PATTERN)).toEqual([
        'https://www.ur-net.go.jp/chintai/kanto/tokyo/20_1234.html',
        'https://www.ur-net.go.jp/chintai/kanto/tokyo/20_5678.html',
      ]);
    });

    it('should work with a pattern that lacks the global flag', () => {
      expect(parseUrlsFromText('x https://a.test/1 y https://a.test/2', /https:\/\/a\.test\/\d/)).toEqual([
        'https://a.test/1',
        'https://a.test/2',
      ]);
    });
  });

  describe('parseTargetsFromCsv', () => {
    it('should read the listing sheet layout', () => {
      const csv = [
        'No.,物件名,対象空室数,最寄駅,住所,電話番号,管理年数,URL',
        '1,見本団地,2,門前仲町駅 徒歩5分,東京都江東区1-2-3,03-1111-2222,12年,https://example.test/a',
        '2,空欄団地,0,,,,,https://example.test/b',
        '3,URLなし,1,駅,住所,000,1年,',
      ].join('\n');

      expect(parseTargetsFromCsv(csv)).toEqual([
        {
          url: 'https://example.test/a',
          name: '見本団地',
          transportation: '門前仲町駅 徒歩5分',
          address: '東京都江東区1-2-3',
          phone: '03-1111-2222',
          managementYears: '12年',
        },
        { url: 'https://example.test/b', name: '空欄団地' },
      ]);
    });

    it('should read headerless rows with the URL in the eighth column', () => {
      const csv = [
        '見本ハイツ,x,1,駅前線,大阪府1-1,06-0000-0000,3年,https://example.test/c',
        'short,row,https://example.test/d',
      ].join('\n');

      expect(parseTargetsFromCsv(csv)).toEqual([
        {
          url: 'https://example.test/c',
          name: '見本ハイツ',
          transportation: '駅前線',
          address: '大阪府1-1',
          phone: '06-0000-0000',
          managementYears: '3年',
        },
      ]);
    });

    it('should map aliased header columns', () => {
      const csv = ['\uFEFFName,URL,TEL,Access', 'Sample Court,https://example.test/e,03-2222-3333,', ',not-a-url,,'].join('\n');

      expect(parseTargetsFromCsv(csv)).toEqual([
        { url: 'https://example.test/e', name: 'Sample Court', phone: '03-2222-3333' },
      ]);
    });

    it('should return nothing for empty content', () => {
      expect(parseTargetsFromCsv('')).toEqual([]);
    });
  });

  describe('targetSourceForFile', () => {
    it('should pick the CSV parser by extension', () => {
      expect(targetSourceForFile('/data/targets.CSV')).toEqual({ csv: '/data/targets.CSV' });
      expect(targetSourceForFile('/data/targets.txt')).toEqual({ file: '/data/targets.txt' });
    });
  });

  describe('loadTargets', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vacancy-targets-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should prefer explicit URLs over files', async () => {
      const targets = await loadTargets({ urls: ['https://example.test/a'], file: '/does/not/exist' }, URL_PATTERN);

      expect(targets).toEqual([{ url: 'https://example.test/a' }]);
    });

    it('should scan a text file for listing URLs', async () => {
      const file = path.join(dir, 'urls.txt');
      await fs.writeFile(file, 'https://www.ur-net.go.jp/chintai/a.html\nhttps://www.ur-net.go.jp/chintai/b.html\n');

      expect(await loadTargets({ file }, URL_PATTERN)).toEqual([
        { url: 'https://www.ur-net.go.jp/chintai/a.html' },
        { url: 'https://www.ur-net.go.jp/chintai/b.html' },
      ]);
    });

    it('should read a CSV file', async () => {
      const csv = path.join(dir, 'targets.csv');
      await fs.writeFile(csv, 'url,name\nhttps://example.test/f,Test Flats\n');

      expect(await loadTargets({ csv }, URL_PATTERN)).toEqual([{ url: 'https://example.test/f', name: 'Test Flats' }]);
    });

    it('should return nothing without a source', async () => {
      expect(await loadTargets({}, URL_PATTERN)).toEqual([]);
    });
  });
});
