import { Router } from "express";
import { PublicKey } from "@solana/web3.js";
import { formatUnits, type TokenStore } from "@capped-token/sdk";
import { pageQuery } from "./query";

export function statusRouter(store: TokenStore): Router {
  const router = Router();

  router.get("/status", (_req, res) => {
    const token = store.load();
    if (!token) {
      res.status(404).json({ error: "Token not found" });
      return;
    }

    const owner = token.owner();
    res.json({
      name: token.name,
      symbol: token.symbol,
      decimals: token.decimals,
      owner: owner ? owner.toBase58() : null,
      paused: token.paused(),
      totalSupply: token.totalSupply().toString(),
      maxSupply: token.maxSupply().toString(),
      remaining: (token.maxSupply() - token.totalSupply()).toString(),
      holders: token.holders().length,
    });
  });

  router.get("/balances/:account", (req, res) => {
    let account: PublicKey;
    try {
      account = new PublicKey(req.params.account);
    } catch {
      res.status(400).json({ error: "Invalid account" });
      return;
    }

    const token = store.load();
    if (!token) {
      res.status(404).json({ error: "Token not found" });
      return;
    }

    const balance = token.balanceOf(account);
    res.json({
      account: account.toBase58(),
      balance: balance.toString(),
      formatted: formatUnits(balance, token.decimals),
    });
  });

  router.get("/holders", (req, res) => {
    const token = store.load();
    if (!token) {
      res.status(404).json({ error: "Token not found" });
      return;
    }

    const { limit, offset } = pageQuery(req);
    const all = token.holders();
    const holders = all.slice(offset, offset + limit).map((h) => ({
      account: h.account.toBase58(),
      balance: h.balance.toString(),
    }));
    res.json({ holders, count: holders.length, total: all.length });
  });

  return router;
}
