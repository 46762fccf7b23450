import { EstateItem, ItemMetadata, RawEstate, RawEstateSchema } from "../types";

function asString(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }

  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }

  return undefined;
}

export function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }

  const text = asString(value);
  if (!text) {
    return undefined;
  }

  const parsed = Number(text.replace(/\s+/g, ""));
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function toFlag(value: unknown): boolean | undefined {
  if (typeof value === "boolean") {
    return value;
  }
  if (value === 1 || value === 0) {
    return value === 1;
  }
  return undefined;
}

function hrefList(links: Array<{ href?: string | null }> | null | undefined): string[] | undefined {
  if (!links) {
    return undefined;
  }
  const hrefs = links.map((link) => asString(link.href)).filter((href): href is string => href !== undefined);
  return hrefs.length > 0 ? hrefs : undefined;
}

function flattenLabels(labels: RawEstate["labelsAll"]): string[] | undefined {
  if (!labels) {
    return undefined;
  }
  const flat = labels
    .flatMap((group) => (Array.isArray(group) ? group : [group]))
    .map((label) => label.trim())
    .filter((label) => label.length > 0);
  return flat.length > 0 ? [...new Set(flat)] : undefined;
}

function companyLogo(logo: string | Array<{ href?: string | null }> | null | undefined): string | undefined {
  if (typeof logo === "string") {
    return asString(logo);
  }
  return hrefList(logo)?.[0];
}

function legacyId(hashId: string | undefined): number | undefined {
  if (!hashId || !/^\d+$/.test(hashId)) {
    return undefined;
  }
  const parsed = Number(hashId);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

/**
 * Flattens one raw `_embedded.estates[]` entry into the item schema and stamps the run metadata.
 * Values that are absent, null or of an unexpected type upstream are left off the item one field
 * at a time. A payload that is not
 * an object yields an item carrying only the metadata, which validation then rejects.
 */
export function toEstateItem(raw: unknown, metadata: ItemMetadata): EstateItem {
  const parsed = RawEstateSchema.safeParse(raw);
  if (!parsed.success) {
    return { ...metadata };
  }

  const estate = parsed.data;
  const hashId = asString(estate.hash_id);
  const company = estate._embedded?.company;

  const candidate: EstateItem = {
    hash_id: hashId,
    id: legacyId(hashId),
    name: asString(estate.name),
    labels_all: flattenLabels(estate.labelsAll),
    exclusively_at_rk: toFlag(estate.exclusively_at_rk),
    category: toFiniteNumber(estate.category),
    has_floor_plan: toFlag(estate.has_floor_plan),
    locality: asString(estate.locality),
    new: toFlag(estate.new),
    type: toFiniteNumber(estate.type),
    price: toFiniteNumber(estate.price),
    seo_category_main_cb: toFiniteNumber(estate.seo?.category_main_cb),
    seo_category_sub_cb: toFiniteNumber(estate.seo?.category_sub_cb),
    seo_category_type_cb: toFiniteNumber(estate.seo?.category_type_cb),
    seo_locality: asString(estate.seo?.locality),
    price_czk_value_raw: toFiniteNumber(estate.price_czk?.value_raw),
    price_czk_unit: asString(estate.price_czk?.unit),
    price_czk_alt_value_raw: toFiniteNumber(estate.price_czk?.alt?.value_raw),
    price_czk_alt_unit: asString(estate.price_czk?.alt?.unit),
    links_self_href: asString(estate._links?.self?.href),
    links_iterator_href: asString(estate._links?.iterator?.href),
    links_images: hrefList(estate._links?.images),
    links_image_middle2: hrefList(estate._links?.image_middle2),
    gps_lat: toFiniteNumber(estate.gps?.lat),
    gps_lon: toFiniteNumber(estate.gps?.lon),
    embedded_company_url: asString(company?.url),
    embedded_company_id: asString(company?.id),
    embedded_company_name: asString(company?.name),
    embedded_company_logo_small: companyLogo(company?.logo_small),
    ...metadata
  };

  const item: EstateItem = {};
  for (const [key, value] of Object.entries(candidate)) {
    if (value !== undefined) {
      Object.assign(item, { [key]: value });
    }
  }
  return item;
}
