import "dotenv/config";
import { QuoteHistoryClient, fromDates } from "../src";

const client = new QuoteHistoryClient({ debug: process.env.QUOTE_DEBUG || false });

const symbol = process.argv[2] ?? "AAPL";

(async () => {
  const dividends = await client.history.dividends(symbol, {
    period: fromDates("America/New_York", "2015-01-01", "2016-12-31"),
  });

  if (!dividends) {
    console.log(`${symbol}: not found`);
    return;
  }
  console.log(`${symbol} dividends:`, dividends);
})().catch(console.error);
