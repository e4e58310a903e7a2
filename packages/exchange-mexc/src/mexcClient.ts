import ccxt, { OHLCV } from "ccxt";
import { Candle, MarketDataClient, createLogger } from "@barsignal/core";
import { mapCcxtCandleToCandle } from "@barsignal/data";

const mexcLogger = createLogger("exchange:mexc");

/** The slice of a ccxt exchange the client reads from. */
export interface OhlcvExchange {
	loadMarkets(): Promise<unknown>;
	market(symbol: string): { symbol: string };
	fetchOHLCV(
		symbol: string,
		timeframe: string,
		since: number | undefined,
		limit: number | undefined
	): Promise<OHLCV[]>;
}

export interface MexcClientOptions {
	apiKey?: string;
	secret?: string;
	/** Read perpetual swap candles instead of spot. */
	useFutures?: boolean;
	exchange?: OhlcvExchange;
}

export class MexcClient implements MarketDataClient {
	private readonly exchange: OhlcvExchange;
	private marketsLoaded = false;

	constructor(options: MexcClientOptions = {}) {
		this.exchange =
			options.exchange ??
			new ccxt.mexc({
				apiKey: options.apiKey || undefined,
				secret: options.secret || undefined,
				enableRateLimit: true,
				options: {
					defaultType: options.useFutures ? "swap" : "spot",
				},
			});
	}

	async fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit = 300,
		since?: number
	): Promise<Candle[]> {
		const marketSymbol = await this.resolveMarketSymbol(symbol);
		const ohlcv = await this.exchange.fetchOHLCV(marketSymbol, timeframe, since, limit);
		mexcLogger.debug("ohlcv_fetched", { symbol: marketSymbol, timeframe, rows: ohlcv.length });
		return ohlcv.map((row) => mapCcxtCandleToCandle(row, symbol, timeframe));
	}

	private async resolveMarketSymbol(symbol: string): Promise<string> {
		await this.ensureMarketsLoaded();
		try {
			return this.exchange.market(symbol).symbol;
		} catch {
			try {
				return this.exchange.market(`${symbol}:USDT`).symbol;
			} catch {
				throw new Error(`Unknown MEXC market symbol for ${symbol}`);
			}
		}
	}

	private async ensureMarketsLoaded(): Promise<void> {
		if (this.marketsLoaded) {
			return;
		}
		await this.exchange.loadMarkets();
		this.marketsLoaded = true;
	}
}
