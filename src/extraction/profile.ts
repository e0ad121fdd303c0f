/**
 * How to locate one field: structural selectors tried in order, a shape
 * predicate each candidate must satisfy, and an optional pattern searched
 * over the enclosing row/page text when no selector produced a value.
 *
 * `take: 'match'` keeps only the matched part of the candidate text
 * (capture group 1 when the predicate has one); `take: 'text'` keeps the
 * whole, whitespace-collapsed text.
 */
export interface FieldStrategy {
  selectors: string[];
  accept: RegExp;
  take: 'match' | 'text';
  textPattern?: RegExp;
}

export interface RowStrategy {
  selectors: string[];
  headerLabels: string[];
  pricePattern: RegExp;
  identifierPattern: RegExp;
}

export interface DetailAffordance {
  linkSelector: string;
  textMarkers: string[];
  hrefMarkers: string[];
}

export interface SiteProfile {
  id: string;
  name: FieldStrategy;
  titleSuffix?: RegExp;
  rows: RowStrategy;
  unit: {
    layout: FieldStrategy;
    rent: FieldStrategy;
    floorArea: FieldStrategy;
    floorLevel: FieldStrategy;
  };
  detail: DetailAffordance;
  transportation: FieldStrategy;
  address: FieldStrategy;
  phone: FieldStrategy;
  managementYears: FieldStrategy;
}

const ANY_TEXT = /\S/;

/**
 * Selectors for a labelled definition/table cell, e.g. `<dt>交通</dt><dd>…</dd>`
 */
function labelled(label: string): string[] {
  return [`dt:has-text("${label}") + dd`, `th:has-text("${label}") + td`, `td:has-text("${label}") + td`];
}

/**
 * UR賃貸住宅 (ur-net.go.jp) property pages: a room table whose vacant rows
 * carry a 詳細 link, plus a labelled outline block for access/address/contact.
 */
export const urNetProfile: SiteProfile = {
  id: 'ur-net',
  name: {
    selectors: ['h1.property-name', '.property-title', '.building-name', 'h1'],
    accept: ANY_TEXT,
    take: 'text',
  },
  titleSuffix: /(?:（[^）]*）)?の賃貸物件｜UR賃貸住宅\s*$/,
  rows: {
    selectors: [
      '.module_tables_room table tbody tr.js-log-item',
      'table tbody tr.js-log-item',
      '.rep_room',
      'table tbody tr',
      'tr',
    ],
    headerLabels: ['間取図', '部屋名', '家賃', '間取り', '床面積', '階数'],
    pricePattern: /\d{1,3}[,，]\d{3}[円日元]?/,
    identifierPattern: /\d+[号棟室]|\d+[LDK]/,
  },
  unit: {
    layout: {
      selectors: ['.rep_room-type', 'td.rep_room-type', 'td:nth-child(4)', 'td:nth-child(3)', 'td:nth-child(5)'],
      accept: /(\d+[SLDK]+)/,
      take: 'match',
      textPattern: /(\d+[SLDK]+)/,
    },
    rent: {
      selectors: [
        'span.rep_room-price',
        '.rep_room-price',
        'td:nth-child(3) span.rep_room-price',
        'td:nth-child(3)',
        'td:nth-child(4)',
      ],
      accept: /\d{1,3}[,，]\d{3}/,
      take: 'text',
      textPattern: /(\d{1,3}[,，]\d{3}[円日元]?)/,
    },
    floorArea: {
      selectors: ['.rep_room-floor', 'td.rep_room-floor', 'td:nth-child(5)', 'td:nth-child(6)'],
      accept: /\d+(?:\.\d+)?(?:㎡|m²|平方米)/,
      take: 'text',
      textPattern: /(\d+(?:\.\d+)?(?:㎡|m²|平方米))/,
    },
    floorLevel: {
      selectors: ['.rep_room-kai', 'td.rep_room-kai', 'td:nth-child(6)', 'td:nth-child(7)', 'td:last-child'],
      accept: /\d+階|[/／]/,
      take: 'text',
      textPattern: /(\d+階(?:[/／]\d+階)?)/,
    },
  },
  detail: {
    linkSelector: 'a',
    textMarkers: ['詳細'],
    hrefMarkers: ['room.html'],
  },
  transportation: {
    selectors: [...labelled('交通'), '.access-info', '.transportation', '.property-access'],
    accept: ANY_TEXT,
    take: 'text',
    textPattern: /[^\n]*(?:駅|線)[^\n]*/,
  },
  address: {
    selectors: [...labelled('所在地'), ...labelled('住所'), '.address', '.location', '.property-address'],
    accept: ANY_TEXT,
    take: 'text',
    textPattern: /(?:所在地|住所)[:：\s]*([^\n]+)/,
  },
  phone: {
    selectors: [...labelled('電話'), ...labelled('TEL'), '.phone', '.tel', '.contact-phone'],
    accept: /\d/,
    take: 'text',
    textPattern: /(?:電話|TEL|Tel|tel)[:：\s]*([0-9\-()]+)/,
  },
  managementYears: {
    selectors: [...labelled('管理年数'), ...labelled('築年'), '.management-years', '.built-year', '.property-age'],
    accept: ANY_TEXT,
    take: 'text',
    textPattern: /(?:管理年数|築年数?)[:：\s]*([^\n]+)/,
  },
};
