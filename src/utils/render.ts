import { JSDOM } from "jsdom";
import YAML from "yaml";
import { Cookbook, Recipe } from "../types/recipe.js";

export const DEFAULT_COOKBOOK_TITLE = "My Personal Cookbook";
export const EMPTY_COOKBOOK_TEXT = "No recipes yet.";

export type CookbookFormat = "html" | "json" | "yaml";

export function parseCookbookFormat(value: string): CookbookFormat {
  if (value === "html" || value === "json" || value === "yaml") return value;
  throw new Error(`Unsupported format: ${value}. Supported formats: html, json, yaml`);
}

export interface RenderOptions {
  title?: string;
  /** Adds a single `<time class="generated">` to the footer when set. */
  generatedAt?: Date;
}

const STYLES = `
*{box-sizing:border-box}
body{margin:0;font-family:Georgia,"Times New Roman",serif;line-height:1.5;color:#222;background:#fdfbf7}
main{max-width:46rem;margin:0 auto;padding:1rem}
h1{text-align:center;font-size:1.8rem;margin:1rem 0 1.5rem}
nav ol{padding-left:1.25rem}
nav a{color:#7a3e12}
.recipe{background:#fff;border:1px solid #e6dfd3;border-radius:8px;padding:1rem 1.25rem;margin:0 0 1.5rem;break-inside:avoid}
.recipe h2{margin:0 0 .5rem;font-size:1.4rem;overflow-wrap:anywhere}
.recipe h3{margin:1rem 0 .25rem;font-size:1.05rem;text-transform:uppercase;letter-spacing:.05em;color:#7a3e12}
.recipe li{margin:.25rem 0;overflow-wrap:anywhere}
.empty{text-align:center;font-style:italic;color:#666}
footer{text-align:center;font-size:.8rem;color:#888;padding:1rem}
@media (max-width:480px){main{padding:.5rem}.recipe{padding:.75rem}h1{font-size:1.5rem}}
@media print{body{background:#fff}.recipe{border:none;page-break-inside:avoid}nav{display:none}}
`.trim();

/**
 * Renders the whole collection as one standalone HTML page. All recipe text
 * goes in through `textContent`, so markup in a title or step stays text.
 */
export function renderCookbook(
  recipes: readonly Recipe[],
  options: RenderOptions = {}
): string {
  const title = options.title ?? DEFAULT_COOKBOOK_TITLE;
  const dom = new JSDOM(
    '<!DOCTYPE html><html lang="en"><head></head><body></body></html>'
  );
  const { document } = dom.window;

  const element = <K extends keyof HTMLElementTagNameMap>(
    tag: K,
    text?: string
  ): HTMLElementTagNameMap[K] => {
    const node = document.createElement(tag);
    if (text !== undefined) node.textContent = text;
    return node;
  };

  const charset = element("meta");
  charset.setAttribute("charset", "utf-8");
  const viewport = element("meta");
  viewport.setAttribute("name", "viewport");
  viewport.setAttribute("content", "width=device-width, initial-scale=1");
  document.head.append(
    charset,
    viewport,
    element("title", title),
    element("style", STYLES)
  );

  const main = element("main");
  main.append(element("h1", title));

  if (recipes.length === 0) {
    const empty = element("p", EMPTY_COOKBOOK_TEXT);
    empty.className = "empty";
    main.append(empty);
  }

  if (recipes.length > 1) {
    const nav = element("nav");
    nav.setAttribute("aria-label", "Contents");
    const list = element("ol");
    recipes.forEach((recipe, index) => {
      const link = element("a", recipe.title);
      link.setAttribute("href", `#recipe-${index + 1}`);
      const item = element("li");
      item.append(link);
      list.append(item);
    });
    nav.append(list);
    main.append(nav);
  }

  recipes.forEach((recipe, index) => {
    const article = element("article");
    article.className = "recipe";
    article.id = `recipe-${index + 1}`;
    article.append(element("h2", recipe.title));

    if (recipe.ingredients.length > 0) {
      const section = element("section");
      section.className = "ingredients";
      const list = element("ul");
      list.append(...recipe.ingredients.map((text) => element("li", text)));
      section.append(element("h3", "Ingredients"), list);
      article.append(section);
    }

    if (recipe.steps.length > 0) {
      const section = element("section");
      section.className = "steps";
      const list = element("ol");
      list.append(...recipe.steps.map((text) => element("li", text)));
      section.append(element("h3", "Steps"), list);
      article.append(section);
    }

    main.append(article);
  });

  document.body.append(main);

  if (options.generatedAt) {
    const stamp = options.generatedAt.toISOString();
    const time = element("time", stamp);
    time.className = "generated";
    time.setAttribute("datetime", stamp);
    const footer = element("footer", "Generated ");
    footer.append(time);
    document.body.append(footer);
  }

  return dom.serialize();
}

export function formatCookbook(
  cookbook: Cookbook,
  format: CookbookFormat,
  options: Omit<RenderOptions, "title"> = {}
): string {
  switch (format) {
    case "html":
      return renderCookbook(cookbook.recipes, { ...options, title: cookbook.title });
    case "json":
      return `${JSON.stringify(cookbook, null, 2)}\n`;
    case "yaml":
      return YAML.stringify(cookbook);
    default:
      throw new Error(`Unsupported format: ${format}`);
  }
}
