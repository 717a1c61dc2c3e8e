export { backoffDelay } from "./backoff-delay.js";
export { isMainModule } from "./is-main.js";
export { isSanePrice } from "./is-sane-price.js";
export { parseEnv } from "./parse-env.js";
export { formatZodErrors } from "./zod-helpers.js";
