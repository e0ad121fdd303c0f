import { DomNode, PageRenderer, RenderedPage } from '../../src/types/renderer';

export interface FakeNodeShape {
  text?: string;
  attrs?: Record<string, string>;
  /** selector -> matching descendants */
  children?: Record<string, FakeNodeShape[]>;
}

/**
 * In-memory node: selectors are looked up literally in `children`
 */
export class FakeNode implements DomNode {
  constructor(protected readonly shape: FakeNodeShape = {}) {}

  async query(selector: string): Promise<DomNode | null> {
    const [first] = this.shape.children?.[selector] ?? [];
    return first ? new FakeNode(first) : null;
  }

  async queryAll(selector: string): Promise<DomNode[]> {
    return (this.shape.children?.[selector] ?? []).map(child => new FakeNode(child));
  }

  async text(): Promise<string | null> {
    return this.shape.text ?? null;
  }

  async attribute(name: string): Promise<string | null> {
    return this.shape.attrs?.[name] ?? null;
  }
}

export interface FakePageShape extends FakeNodeShape {
  title?: string;
  /** Navigation rejects this many times before succeeding */
  failNavigations?: number;
  failClose?: boolean;
}

export class FakePage extends FakeNode implements RenderedPage {
  navigations: Array<{ url: string; timeoutMs: number }> = [];
  closed = false;
  private failuresLeft: number;

  constructor(private readonly pageShape: FakePageShape = {}) {
    super(pageShape);
    this.failuresLeft = pageShape.failNavigations ?? 0;
  }

  async navigate(url: string, timeoutMs: number): Promise<void> {
    this.navigations.push({ url, timeoutMs });
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error(`Timeout ${timeoutMs}ms exceeded`);
    }
  }

  async title(): Promise<string> {
    return this.pageShape.title ?? '';
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.pageShape.failClose) {
      throw new Error('Target page has been closed');
    }
  }
}

/**
 * Hands out pages from a list of page shapes, one fresh page per call
 */
export class FakeRenderer implements PageRenderer {
  pages: FakePage[] = [];
  private queue: FakePageShape[];

  constructor(pages: FakePageShape[]) {
    this.queue = [...pages];
  }

  async newPage(): Promise<RenderedPage> {
    const page = new FakePage(this.queue.shift() ?? {});
    this.pages.push(page);
    return page;
  }
}

/**
 * A table row as the listing pages render it
 */
export function unitRow(cells: { layout: string; rent: string; area: string; floor: string; link?: boolean }): FakeNodeShape {
  const links: FakeNodeShape[] = cells.link ? [{ text: '詳細', attrs: { href: '/chintai/room.html?id=1' } }] : [];
  return {
    text: `101号室 ${cells.rent}円 ${cells.layout} ${cells.area} ${cells.floor}`,
    children: {
      '.rep_room-type': [{ text: cells.layout }],
      'span.rep_room-price': [{ text: `${cells.rent}円` }],
      '.rep_room-floor': [{ text: cells.area }],
      '.rep_room-kai': [{ text: cells.floor }],
      a: links,
    },
  };
}
