// src/db/schema/enums.ts

import { pgEnum } from "drizzle-orm/pg-core";
import { DIGEST_STATUSES, ITEM_STATUSES } from "@digest/shared";

/** Lifecycle of an enriched item. `digested` is terminal. */
export const itemStatusEnum = pgEnum("item_status", ITEM_STATUSES);

/** A digest row is either the authoritative published record or a failed attempt. */
export const digestStatusEnum = pgEnum("digest_status", DIGEST_STATUSES);
