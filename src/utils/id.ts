import { randomUUID } from "node:crypto";

export const makeId = (): string => randomUUID();

export const makeShortId = (length = 12): string => randomUUID().replace(/-/g, "").slice(0, length);
