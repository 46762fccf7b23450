export interface EstatesQuery {
  mainCb: number;
  typeCb: number;
  perPage: number;
  page: number;
  regionId?: number;
}

function estatesEndpoint(apiBaseUrl: string): string {
  const trimmed = apiBaseUrl.trim().replace(/\/+$/, "");
  if (/\/estates$/i.test(trimmed)) {
    return trimmed;
  }
  return `${trimmed}/estates`;
}

export function buildEstatesUrl(apiBaseUrl: string, query: EstatesQuery): string {
  const url = new URL(estatesEndpoint(apiBaseUrl));
  url.searchParams.set("category_main_cb", String(query.mainCb));
  url.searchParams.set("category_type_cb", String(query.typeCb));
  if (query.regionId !== undefined) {
    url.searchParams.set("locality_region_id", String(query.regionId));
  }
  url.searchParams.set("per_page", String(query.perPage));
  url.searchParams.set("page", String(query.page));
  return url.toString();
}
