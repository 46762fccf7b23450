import { z } from "zod";

const numberish = z.union([z.number(), z.string()]);
const flag = z.union([z.boolean(), z.number()]);

// An off-type value drops only its own field; the rest of the estate is kept.
const lenient = <T extends z.ZodTypeAny>(schema: T) => schema.optional().nullable().catch(undefined);

const HrefSchema = z.object({ href: lenient(z.string()) }).passthrough();
const HrefListSchema = z.array(HrefSchema);

export const RawEstateSchema = z
  .object({
    hash_id: lenient(numberish),
    name: lenient(z.string()),
    labelsAll: lenient(z.array(z.union([z.array(z.string()), z.string()]))),
    exclusively_at_rk: lenient(flag),
    category: lenient(numberish),
    has_floor_plan: lenient(flag),
    locality: lenient(z.string()),
    new: lenient(flag),
    type: lenient(numberish),
    price: lenient(numberish),
    seo: lenient(
      z
        .object({
          category_main_cb: lenient(numberish),
          category_sub_cb: lenient(numberish),
          category_type_cb: lenient(numberish),
          locality: lenient(z.string())
        })
        .passthrough()
    ),
    price_czk: lenient(
      z
        .object({
          value_raw: lenient(numberish),
          unit: lenient(z.string()),
          alt: lenient(
            z
              .object({
                value_raw: lenient(numberish),
                unit: lenient(z.string())
              })
              .passthrough()
          )
        })
        .passthrough()
    ),
    _links: lenient(
      z
        .object({
          self: lenient(HrefSchema),
          iterator: lenient(HrefSchema),
          images: lenient(HrefListSchema),
          image_middle2: lenient(HrefListSchema)
        })
        .passthrough()
    ),
    gps: lenient(
      z
        .object({
          lat: lenient(numberish),
          lon: lenient(numberish)
        })
        .passthrough()
    ),
    _embedded: lenient(
      z
        .object({
          company: lenient(
            z
              .object({
                url: lenient(z.string()),
                id: lenient(numberish),
                name: lenient(z.string()),
                logo_small: lenient(z.union([z.string(), HrefListSchema]))
              })
              .passthrough()
          )
        })
        .passthrough()
    )
  })
  .passthrough();

export const EstatesPageSchema = z.object({
  result_size: z.number().int().nonnegative().optional(),
  _embedded: z.object({
    estates: z.array(z.unknown())
  })
});

export const ResultSizeSchema = z.object({
  result_size: z.number().int().nonnegative()
});

export type RawEstate = z.infer<typeof RawEstateSchema>;
export type EstatesPage = z.infer<typeof EstatesPageSchema>;

export type FieldValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | readonly FieldValue[]
  | { readonly [key: string]: FieldValue };

export type ItemRecord = Readonly<Record<string, FieldValue>>;

export type EstateItem = {
  hash_id?: string;
  id?: number;
  name?: string;
  labels_all?: string[];
  exclusively_at_rk?: boolean;
  category?: number;
  has_floor_plan?: boolean;
  locality?: string;
  new?: boolean;
  type?: number;
  price?: number;
  seo_category_main_cb?: number;
  seo_category_sub_cb?: number;
  seo_category_type_cb?: number;
  seo_locality?: string;
  price_czk_value_raw?: number;
  price_czk_unit?: string;
  price_czk_alt_value_raw?: number;
  price_czk_alt_unit?: string;
  links_self_href?: string;
  links_iterator_href?: string;
  links_images?: string[];
  links_image_middle2?: string[];
  gps_lat?: number;
  gps_lon?: number;
  embedded_company_url?: string;
  embedded_company_id?: string;
  embedded_company_name?: string;
  embedded_company_logo_small?: string;
  scraped_at?: string;
  source_page?: number;
  source_category?: string;
};

export type EstateField = keyof EstateItem;

export interface CategoryDefinition {
  name: string;
  mainCb: number;
  typeCb: number;
}

export interface PageTask {
  category: CategoryDefinition;
  page: number;
  url: string;
}

export interface ItemMetadata {
  scraped_at: string;
  source_page: number;
  source_category: string;
}
