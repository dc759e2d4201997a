import "dotenv/config";
import { QuoteHistoryClient } from "../src";

const client = new QuoteHistoryClient({ debug: process.env.QUOTE_DEBUG || false });

const symbols = process.argv.slice(2);
if (symbols.length === 0) symbols.push("AAPL", "NVDA", "TSLA");

(async () => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), 30_000);

  try {
    const result = await client.history.splitsMany(symbols, { signal: controller.signal });
    for (const [symbol, splits] of result) {
      const ratios = splits?.map((s) => `${s.date} ${s.beforeSplit}:${s.afterSplit}`).join(", ");
      console.log(`${symbol}: ${ratios ?? "not found"}`);
    }
  } finally {
    clearTimeout(timer);
  }
})().catch(console.error);
