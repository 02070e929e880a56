import type { Sleeper } from "../ports/retry-policy";

export const sleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));
