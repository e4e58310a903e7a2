export { MexcClient } from "./mexcClient";
export type { MexcClientOptions, OhlcvExchange } from "./mexcClient";
