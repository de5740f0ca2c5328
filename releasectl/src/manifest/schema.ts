/** JSON Schema of the manifest file as written to disk. */
export const MANIFEST_SCHEMA = {
  $schema: "https://json-schema.org/draft/2020-12/schema",
  type: "array",
  items: {
    type: "object",
    required: ["version", "utc-unixnano", "links"],
    additionalProperties: false,
    properties: {
      version: { type: "string", minLength: 1 },
      "utc-unixnano": { type: "integer" },
      links: {
        type: "array",
        items: {
          type: "object",
          required: ["link", "sha256"],
          additionalProperties: false,
          properties: {
            link: { type: "string", minLength: 1 },
            sha256: { type: "string", pattern: "^[0-9a-f]{64}$" },
          },
        },
      },
    },
  },
} as const;

/** Shape of a manifest that passed the schema, before timestamps are made exact. */
export type PlainManifest = Array<{
  version: string;
  "utc-unixnano": number;
  links: Array<{ link: string; sha256: string }>;
}>;
