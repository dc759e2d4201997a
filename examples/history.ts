import "dotenv/config";
import { QuoteHistoryClient, FREQUENCY, fromDates, fromDuration } from "../src";

const client = new QuoteHistoryClient({
  debug: process.env.QUOTE_DEBUG || false,
  callbacks: {
    onSession: (crumb) => console.log(`Session crumb: ${crumb}`),
    onNotFound: (symbol) => console.warn(`Unknown symbol: ${symbol}`),
    onError: (err) => console.error(`Error [${err.code}]: ${err.message}`),
  },
});

const symbols = (process.argv[2] ?? process.env.QUOTE_SYMBOLS ?? "AAPL,MSFT").split(",");
const timeZone = process.env.QUOTE_TIME_ZONE ?? "America/New_York";
const from = process.env.QUOTE_FROM;

const period = from ? fromDates(timeZone, from, process.env.QUOTE_TO) : fromDuration({ days: 10 });

(async () => {
  const result = await client.history.getMany(symbols, { period, frequency: FREQUENCY.DAILY });

  for (const [symbol, ticks] of result) {
    if (!ticks) {
      console.log(`${symbol}: not found`);
      continue;
    }
    console.log(`${symbol}: ${ticks.length} bars`);
    for (const tick of ticks.slice(-5)) {
      console.log(`  ${tick.date}  O ${tick.open}  H ${tick.high}  L ${tick.low}  C ${tick.close}  V ${tick.volume}`);
    }
  }
})().catch(console.error);
