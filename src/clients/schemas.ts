import { jot, type InferJot } from '../jot.js';

const thingData = jot.object({
  name: jot.string(),
  author: jot.nullable(jot.string()),
  created_utc: jot.number(),
  score: jot.withDefault(jot.number(), 0),
  body: jot.withDefault(jot.string(), ''),
  parent_id: jot.nullable(jot.string()),
  title: jot.nullable(jot.string()),
  selftext: jot.withDefault(jot.string(), ''),
});

export type ThingData = InferJot<typeof thingData>;

const listingNode = jot.object({
  data: jot.object({
    children: jot.array(
      jot.object({
        kind: jot.string(),
        data: jot.unknown(),
      }),
    ),
    after: jot.nullable(jot.string()),
  }),
});

const thingKinds = ['t1', 't3'] as const;

export interface ParsedThing {
  kind: (typeof thingKinds)[number];
  data: ThingData;
}

export interface ParsedListing {
  things: ParsedThing[];
  after: string | null;
}

/**
 * Validates a Reddit listing and keeps only comments (t1) and posts (t3).
 * `more` stubs and any other kinds are dropped.
 */
export function parseListing(payload: unknown): ParsedListing {
  const listing = listingNode.parse(payload, 'listing');
  const kind = jot.literal(thingKinds);
  const things: ParsedThing[] = [];

  listing.data.children.forEach((child, index) => {
    if (!thingKinds.some((candidate) => candidate === child.kind)) {
      return;
    }
    const path = `listing.data.children[${index}]`;
    things.push({ kind: kind.parse(child.kind, `${path}.kind`), data: thingData.parse(child.data, `${path}.data`) });
  });

  return { things, after: listing.data.after };
}

const tokenNode = jot.object({
  access_token: jot.string(),
  token_type: jot.string(),
  expires_in: jot.number(),
});

export type TokenPayload = InferJot<typeof tokenNode>;

export function parseToken(payload: unknown): TokenPayload {
  return tokenNode.parse(payload, 'token');
}
