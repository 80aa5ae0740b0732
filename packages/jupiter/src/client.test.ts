import { HttpError, TransientError, classifyError } from "@tradeloop/core";
import { describe, expect, it, vi } from "vitest";
import { JupiterClient, type FetchLike, type JupiterQuoteResponse } from "./client.js";

const BASE_MINT = "addrBASE";

function quote(overrides: Partial<JupiterQuoteResponse> = {}): JupiterQuoteResponse {
  return {
    inputMint: BASE_MINT,
    outputMint: "addrFOO",
    inAmount: "100000000",
    outAmount: "50000000000",
    otherAmountThreshold: "49750000000",
    swapMode: "ExactIn",
    slippageBps: 50,
    priceImpactPct: "0.01",
    routePlan: [
      {
        percent: 100,
        swapInfo: {
          ammKey: "amm1",
          label: "Raydium",
          inputMint: BASE_MINT,
          outputMint: "addrFOO",
          inAmount: "100000000",
          outAmount: "50000000000",
        },
      },
    ],
    ...overrides,
  };
}

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

describe("JupiterClient", () => {
  it("builds the quote query string", async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(jsonResponse(quote()));
    const client = new JupiterClient({ baseUrl: "https://quote.test/v1/", fetch: fetchMock });

    const result = await client.getQuote({
      inputMint: BASE_MINT,
      outputMint: "addrFOO",
      amount: "100000000",
      slippageBps: 50,
    });

    expect(result.outAmount).toBe("50000000000");
    const requested = fetchMock.mock.calls[0]?.[0];
    expect(String(requested)).toBe(
      `https://quote.test/v1/quote?inputMint=${BASE_MINT}&outputMint=addrFOO&amount=100000000&slippageBps=50&swapMode=ExactIn`,
    );
  });

  it("posts the quote and wallet to the swap endpoint", async () => {
    const fetchMock = vi
      .fn<FetchLike>()
      .mockResolvedValue(jsonResponse({ swapTransaction: "AQID", lastValidBlockHeight: 1234 }));
    const client = new JupiterClient({ baseUrl: "https://quote.test/v1", fetch: fetchMock });

    const result = await client.getSwapTransaction({
      userPublicKey: "walletPubkey",
      quoteResponse: quote(),
      priorityFeeLamports: 5000,
    });

    expect(result).toEqual({ swapTransaction: "AQID", lastValidBlockHeight: 1234 });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://quote.test/v1/swap");
    expect(init?.method).toBe("POST");
    const body = JSON.parse(String(init?.body)) as Record<string, unknown>;
    expect(body.userPublicKey).toBe("walletPubkey");
    expect(body.prioritizationFeeLamports).toBe(5000);
    expect(body.wrapAndUnwrapSol).toBe(true);
  });

  it("raises an HttpError with Retry-After on 429", async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(new Response("slow down", { status: 429, headers: { "Retry-After": "4" } }));
    const client = new JupiterClient({ baseUrl: "https://quote.test/v1", fetch: fetchMock });

    const error = await client
      .getQuote({ inputMint: BASE_MINT, outputMint: "addrFOO", amount: "1", slippageBps: 50 })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(HttpError);
    expect(classifyError(error)).toEqual({ kind: "throttle", retryAfterMs: 4_000 });
  });

  it("raises a validation-class error on 400", async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(new Response("invalid mint", { status: 400 }));
    const client = new JupiterClient({ baseUrl: "https://quote.test/v1", fetch: fetchMock });

    const error = await client
      .getQuote({ inputMint: BASE_MINT, outputMint: "nope", amount: "1", slippageBps: 50 })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(HttpError);
    expect(classifyError(error).kind).toBe("validation");
  });

  it("wraps network failures as transient", async () => {
    const fetchMock = vi.fn<FetchLike>().mockRejectedValue(new TypeError("fetch failed"));
    const client = new JupiterClient({ baseUrl: "https://quote.test/v1", fetch: fetchMock });

    await expect(
      client.getQuote({ inputMint: BASE_MINT, outputMint: "addrFOO", amount: "1", slippageBps: 50 }),
    ).rejects.toBeInstanceOf(TransientError);
  });

  it("rejects a quote body without amounts", async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(jsonResponse({ error: "no route" }));
    const client = new JupiterClient({ baseUrl: "https://quote.test/v1", fetch: fetchMock });

    await expect(
      client.getQuote({ inputMint: BASE_MINT, outputMint: "addrFOO", amount: "1", slippageBps: 50 }),
    ).rejects.toThrow("Jupiter quote response missing amounts");
  });

  it("summarizes unique route labels", () => {
    const client = new JupiterClient({ baseUrl: "https://quote.test/v1" });
    const base = quote();
    const hop = base.routePlan[0];
    if (!hop) {
      throw new Error("fixture has no route");
    }
    const twoHop = quote({ routePlan: [hop, hop, { ...hop, swapInfo: { ...hop.swapInfo, label: "Orca" } }] });

    expect(client.parseRouteSummary(twoHop)).toEqual(["Raydium", "Orca"]);
  });
});
