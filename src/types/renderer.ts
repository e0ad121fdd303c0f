/**
 * A queryable node in a rendered document (the page itself or an element within it)
 */
export interface DomNode {
  query(selector: string): Promise<DomNode | null>;
  queryAll(selector: string): Promise<DomNode[]>;
  text(): Promise<string | null>;
  attribute(name: string): Promise<string | null>;
}

/**
 * A single browser page context, owned by one target at a time
 */
export interface RenderedPage extends DomNode {
  navigate(url: string, timeoutMs: number): Promise<void>;
  title(): Promise<string>;
  close(): Promise<void>;
}

/**
 * Source of fresh page contexts
 */
export interface PageRenderer {
  newPage(): Promise<RenderedPage>;
}
