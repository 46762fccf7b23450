import assert from "node:assert/strict";
import test from "node:test";
import { buildEstatesUrl } from "./url";

test("buildEstatesUrl appends the estates path and query parameters in a stable order", () => {
  const url = buildEstatesUrl("https://www.sreality.cz/api/cs/v2/", {
    mainCb: 1,
    typeCb: 2,
    regionId: 10,
    perPage: 999,
    page: 3
  });
  assert.equal(
    url,
    "https://www.sreality.cz/api/cs/v2/estates?category_main_cb=1&category_type_cb=2&locality_region_id=10&per_page=999&page=3"
  );
});

test("buildEstatesUrl omits the region filter when none is configured", () => {
  const url = buildEstatesUrl("https://api.example.test/v2/estates", { mainCb: 4, typeCb: 1, perPage: 1, page: 1 });
  assert.equal(url, "https://api.example.test/v2/estates?category_main_cb=4&category_type_cb=1&per_page=1&page=1");
});
