import http from "http";
import { URL } from "url";

/**
 * Deterministic fake shop for local runs and E2E tests.
 * - GET /catalog                      category links (`a.all`)
 * - GET /category/:name?page=N        listing page, `a.next` until the last page
 * - GET /status/:code                 responds with that status
 * - GET /flaky?key=K&failures=N       503 for the first N hits of K, then a listing
 */
export type FakeShopOptions = {
  categories?: string[];
  pagesPerCategory?: number;
  itemsPerPage?: number;
};

const page = (body: string) => `<!doctype html><html><body>${body}</body></html>`;

const listingItem = (origin: string, category: string, pageNumber: number, index: number) => {
  const id = `${category}-${pageNumber}-${index}`;
  return `
    <div class="listing_item">
      <a class="product_name" href="${origin}/p/${id}">
        <div class="image-container"><img src="/img/${id}.jpg" alt=""></div>
        <div>  Product ${id}  </div>
      </a>
      <span class="our_price">$${(pageNumber * 100 + index).toFixed(2)}</span>
      <div class="purchase-row"><a href="#" data-sku="SKU-${id}">Add to cart</a></div>
    </div>`;
};

export const createFakeShopServer = (options: FakeShopOptions = {}) => {
  const categories = options.categories ?? ["knives", "tools"];
  const pagesPerCategory = options.pagesPerCategory ?? 2;
  const itemsPerPage = options.itemsPerPage ?? 3;
  const flakyHits = new Map<string, number>();

  const listing = (origin: string, category: string, pageNumber: number) => {
    const items = Array.from({ length: itemsPerPage }, (_, i) => listingItem(origin, category, pageNumber, i + 1));
    const next =
      pageNumber < pagesPerCategory ? `<a class="next" href="/category/${category}?page=${pageNumber + 1}">Next</a>` : "";
    return page(`${items.join("")}${next}`);
  };

  return http.createServer((req, res) => {
    const origin = `http://${req.headers.host ?? "localhost"}`;
    const url = new URL(req.url ?? "/", origin);
    const send = (status: number, body = "") => {
      res.writeHead(status, { "content-type": "text/html; charset=utf-8" });
      res.end(body);
    };

    if (url.pathname === "/catalog") {
      const links = categories.map((name) => `<a class="all" href="/category/${name}">All ${name}</a>`).join("");
      return send(200, page(links));
    }

    const category = /^\/category\/([\w-]+)$/.exec(url.pathname);
    if (category && categories.includes(category[1])) {
      const pageNumber = Number(url.searchParams.get("page") ?? "1");
      if (!Number.isInteger(pageNumber) || pageNumber < 1 || pageNumber > pagesPerCategory) return send(404);
      return send(200, listing(origin, category[1], pageNumber));
    }

    const status = /^\/status\/(\d{3})$/.exec(url.pathname);
    if (status) return send(Number(status[1]), page(`status ${status[1]}`));

    if (url.pathname === "/flaky") {
      const key = url.searchParams.get("key") ?? "default";
      const failures = Number(url.searchParams.get("failures") ?? "1");
      const hits = (flakyHits.get(key) ?? 0) + 1;
      flakyHits.set(key, hits);
      if (hits <= failures) return send(503, page("try again"));
      return send(200, listing(origin, `flaky-${key}`, pagesPerCategory));
    }

    return send(404, page("not found"));
  });
};

if (require.main === module) {
  const port = Number(process.env.FAKE_SHOP_PORT ?? 3999);
  createFakeShopServer().listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake shop server on http://localhost:${port}`);
  });
}
