import { describe, it, expect } from "vitest";
import { ProviderGateway, createProviderGateway } from "../../src/providers/gateway.js";
import type { LookupResult, PassageProvider } from "../../src/providers/types.js";
import { FakeProvider, found, silentLogger } from "../helpers/fixtures.js";

describe("ProviderGateway", () => {
  it("routes each translation to its provider", async () => {
    const publicDomain = new FakeProvider(["kjv", "web"], { "John 3:16|web": found("web text", "John 3:16") });
    const licensed = new FakeProvider(["esv"], { "John 3:16|esv": found("esv text", "John 3:16") });
    const gateway = new ProviderGateway([publicDomain, licensed], silentLogger());

    expect(await gateway.fetch("John 3:16", "WEB")).toEqual(found("web text", "John 3:16"));
    expect(await gateway.fetch("John 3:16", "esv")).toEqual(found("esv text", "John 3:16"));
    expect(publicDomain.calls).toEqual([{ query: "John 3:16", translation: "web" }]);
    expect(licensed.calls).toEqual([{ query: "John 3:16", translation: "esv" }]);
  });

  it("lists and checks supported translations", () => {
    const gateway = new ProviderGateway([new FakeProvider(["kjv", "ESV"])], silentLogger());
    expect(gateway.translations()).toEqual(["kjv", "esv"]);
    expect(gateway.supports("Kjv")).toBe(true);
    expect(gateway.supports("niv")).toBe(false);
  });

  it("keeps the first provider registered for a translation", async () => {
    const first = new FakeProvider(["kjv"], { "Ps 23|kjv": found("first", "Psalms 23") });
    const second = new FakeProvider(["kjv"], { "Ps 23|kjv": found("second", "Psalms 23") });
    const gateway = new ProviderGateway([first, second], silentLogger());
    expect(await gateway.fetch("Ps 23", "kjv")).toEqual(found("first", "Psalms 23"));
  });

  it("does not fall back to another provider on failure", async () => {
    const failing = new FakeProvider(["kjv"]);
    const other = new FakeProvider(["kjv", "web"], { "John 3:16|kjv": found("text", "John 3:16") });
    const gateway = new ProviderGateway([failing, other], silentLogger());

    expect(await gateway.fetch("John 3:16", "kjv")).toEqual({ kind: "not-found" });
    expect(other.calls).toHaveLength(0);
  });

  it("reports unknown translations as unavailable", async () => {
    const gateway = new ProviderGateway([new FakeProvider(["kjv"])], silentLogger());
    expect(await gateway.fetch("John 3:16", "niv")).toEqual({
      kind: "unavailable",
      reason: 'no provider serves translation "niv"',
    });
  });

  it("turns a throwing provider into unavailable", async () => {
    const broken: PassageProvider = {
      id: "broken",
      translations: ["kjv"],
      fetch: async (): Promise<LookupResult> => {
        throw new Error("boom");
      },
    };
    const gateway = new ProviderGateway([broken], silentLogger());
    expect(await gateway.fetch("John 3:16", "kjv")).toEqual({ kind: "unavailable", reason: "boom" });
  });
});

describe("createProviderGateway", () => {
  it("serves ESV and the public-domain editions", () => {
    const gateway = createProviderGateway({ apiKeys: {}, timeoutMs: 1_000 }, silentLogger());
    expect(gateway.translations().sort()).toEqual(["asv", "bbe", "darby", "esv", "kjv", "web", "ylt"]);
  });

  it("reports a missing ESV key", async () => {
    const gateway = createProviderGateway(
      {
        apiKeys: {},
        timeoutMs: 1_000,
        fetchImpl: async () => new Response("{}"),
      },
      silentLogger(),
    );
    expect(await gateway.fetch("John 3:16", "esv")).toEqual({ kind: "credential-missing", provider: "esv" });
  });
});
