import { expect } from "chai";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { Keypair } from "@solana/web3.js";
import { TokenError, TokenStore, type TokenErrorCode } from "@capped-token/sdk";
import { parseBatchFile, parseBatchList } from "../sdk/cli/src/batch";
import { loadKeypair } from "../sdk/cli/src/config";
import * as init from "../sdk/cli/src/commands/init";
import * as mint from "../sdk/cli/src/commands/mint";
import * as multisend from "../sdk/cli/src/commands/multisend";
import * as pause from "../sdk/cli/src/commands/pause";
import { newAccount } from "./helpers";

describe("CLI batch parsing", () => {
  it("parses comma-separated recipients and amounts", () => {
    const a = newAccount();
    const b = newAccount();

    const batch = parseBatchList(` ${a.toBase58()} , ${b.toBase58()}`, "10, 20");

    expect(batch.recipients.map((r) => r.toBase58())).to.deep.equal([a.toBase58(), b.toBase58()]);
    expect(batch.amounts).to.deep.equal([BigInt(10), BigInt(20)]);
  });

  it("passes unequal lists through for the token to reject", () => {
    const batch = parseBatchList(newAccount().toBase58(), "1,2");
    expect(batch.recipients).to.have.length(1);
    expect(batch.amounts).to.have.length(2);
  });

  it("reads a CSV with a header, comments and blank lines", () => {
    const a = newAccount().toBase58();
    const b = newAccount().toBase58();
    const csv = ["recipient,amount", "# payroll", `${a},5`, "", `${b}, 7`, `${a},1`].join("\n");

    const batch = parseBatchFile(csv);

    expect(batch.recipients.map((r) => r.toBase58())).to.deep.equal([a, b, a]);
    expect(batch.amounts).to.deep.equal([BigInt(5), BigInt(7), BigInt(1)]);
  });

  it("names the offending line", () => {
    const csv = `${newAccount().toBase58()},5\n\n${newAccount().toBase58()}`;
    expect(() => parseBatchFile(csv)).to.throw('Line 3: expected "recipient,amount"');
  });

  it("rejects decimal or negative amounts", () => {
    expect(() => parseBatchList(newAccount().toBase58(), "1.5")).to.throw("Invalid amount #1: 1.5");
    expect(() => parseBatchList(newAccount().toBase58(), "-1")).to.throw("Invalid amount #1: -1");
  });
});

describe("CLI commands", () => {
  const log = console.log;
  let dir: string;
  let keypairPath: string;
  let dbPath: string;
  let owner: Keypair;

  function args<T extends object>(extra: T) {
    return { _: [], $0: "capped-token", keypair: keypairPath, db: dbPath, ...extra };
  }

  async function expectRejects(run: Promise<unknown>, code: TokenErrorCode): Promise<void> {
    try {
      await run;
    } catch (err) {
      expect(err).to.be.instanceOf(TokenError);
      expect(err).to.have.property("code", code);
      return;
    }
    expect.fail(`Expected a ${code} error`);
  }

  function withStore<T>(read: (store: TokenStore) => T): T {
    const store = new TokenStore(dbPath);
    try {
      return read(store);
    } finally {
      store.close();
    }
  }

  before(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "capped-token-"));
    owner = Keypair.generate();
    keypairPath = path.join(dir, "owner.json");
    dbPath = path.join(dir, "db", "token.sqlite");
    fs.writeFileSync(keypairPath, JSON.stringify(Array.from(owner.secretKey)));
  });

  beforeEach(() => {
    console.log = () => undefined;
  });

  afterEach(() => {
    console.log = log;
  });

  after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("loads the keypair file", () => {
    expect(loadKeypair(keypairPath).publicKey.equals(owner.publicKey)).to.equal(true);
  });

  it("deploys a token owned by the keypair", async () => {
    await init.handler(args({ name: "Payroll", symbol: "PAY", decimals: 0, maxSupply: "1000" }));

    const token = withStore((s) => s.load());
    expect(token?.maxSupply()).to.equal(BigInt(1000));
    expect(token?.owner()?.equals(owner.publicKey)).to.equal(true);
  });

  it("refuses to deploy twice into one database", async () => {
    let message = "";
    try {
      await init.handler(args({ name: "Again", symbol: "AGN", decimals: 0, maxSupply: "5" }));
    } catch (err) {
      message = err instanceof Error ? err.message : String(err);
    }
    expect(message).to.equal(`A token already exists in ${dbPath}`);
  });

  it("mints and multisends, persisting each step", async () => {
    const b = newAccount();
    const c = newAccount();

    await mint.handler(args({ to: owner.publicKey.toBase58(), amount: "600" }));
    await multisend.handler(args({ to: `${b.toBase58()},${c.toBase58()}`, amounts: "100,200" }));

    const token = withStore((s) => s.load());
    expect(token?.balanceOf(owner.publicKey)).to.equal(BigInt(300));
    expect(token?.balanceOf(b)).to.equal(BigInt(100));
    expect(token?.balanceOf(c)).to.equal(BigInt(200));

    const [last] = withStore((s) => s.getOperations({ limit: 1 }));
    expect(last).to.include({ operation: "multisend", amount: "300", target: "2 recipients", status: "confirmed" });
  });

  it("leaves the store untouched when a batch file overdraws", async () => {
    const file = path.join(dir, "batch.csv");
    fs.writeFileSync(file, `recipient,amount\n${newAccount().toBase58()},250\n${newAccount().toBase58()},150\n`);

    await expectRejects(multisend.handler(args({ file })), "InsufficientBalance");

    const token = withStore((s) => s.load());
    expect(token?.balanceOf(owner.publicKey)).to.equal(BigInt(300));
    const [last] = withStore((s) => s.getOperations({ limit: 1 }));
    expect(last).to.include({ operation: "multisend", status: "failed" });
  });

  it("refuses to mint past the ceiling", async () => {
    await expectRejects(mint.handler(args({ to: owner.publicKey.toBase58(), amount: "401" })), "SupplyExceeded");
    expect(withStore((s) => s.load())?.totalSupply()).to.equal(BigInt(600));
  });

  it("pauses and unpauses transfers", async () => {
    await pause.handler(args({ unpause: false }));
    expect(withStore((s) => s.load())?.paused()).to.equal(true);

    await expectRejects(
      multisend.handler(args({ to: newAccount().toBase58(), amounts: "1" })),
      "TransfersPaused"
    );

    await pause.handler(args({ unpause: true }));
    expect(withStore((s) => s.load())?.paused()).to.equal(false);
  });
});
