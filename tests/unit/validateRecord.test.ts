import { InvalidRecordError, validateRecord } from "../../src/core/record/validateRecord";

const defaults = { shopName: "testshop", now: () => new Date("2026-03-01T10:00:00.000Z") };

describe("validateRecord", () => {
  it("fills shopName and scrapedAt and strips unknown fields", async () => {
    const record = await validateRecord(
      { name: "  Folding Knife ", priceRegular: 19.5, url: "https://shop.test/p/1", sku: "K-1", color: "red" },
      defaults
    );

    expect(record).toEqual({
      shopName: "testshop",
      sku: "K-1",
      name: "Folding Knife",
      priceRegular: 19.5,
      scrapedAt: "2026-03-01T10:00:00.000Z",
      url: "https://shop.test/p/1"
    });
  });

  it("accepts numeric strings for prices and numbers for sku", async () => {
    const record = await validateRecord(
      { name: "Knife", priceRegular: " 12.90 ", pricePromo: "9", sku: 4411, url: "https://shop.test/p/2" },
      defaults
    );

    expect(record.priceRegular).toBe(12.9);
    expect(record.pricePromo).toBe(9);
    expect(record.sku).toBe("4411");
  });

  it("treats empty optional fields as absent", async () => {
    const record = await validateRecord(
      { name: "Knife", priceRegular: 5, pricePromo: "", sku: null, url: "https://shop.test/p/3" },
      defaults
    );

    expect(record.pricePromo).toBeUndefined();
    expect(record.sku).toBeUndefined();
  });

  it("keeps a shopName supplied by the parser", async () => {
    const record = await validateRecord(
      { shopName: "outlet", name: "Knife", priceRegular: 5, url: "https://shop.test/p/4" },
      defaults
    );

    expect(record.shopName).toBe("outlet");
  });

  it("rejects items missing required fields", async () => {
    const error = await validateRecord({ name: "", priceRegular: "n/a", url: "not-a-url" }, defaults).catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(InvalidRecordError);
    if (!(error instanceof InvalidRecordError)) return;
    expect(error.issues).toHaveLength(3);
    expect(error.issues).toEqual(
      expect.arrayContaining([
        expect.stringMatching(/^name:/),
        expect.stringMatching(/^priceRegular:/),
        expect.stringMatching(/^url:/)
      ])
    );
  });

  it.each([
    [null, "null"],
    [42, "number"],
    ["Knife", "string"],
    [[{ name: "Knife" }], "array"]
  ])("rejects %p as not an object", async (raw, kind) => {
    await expect(validateRecord(raw, defaults)).rejects.toMatchObject({
      name: "InvalidRecordError",
      issues: [`(root): Expected object, received ${kind}`]
    });
  });

  it("rejects negative prices", async () => {
    await expect(
      validateRecord({ name: "Knife", priceRegular: -1, url: "https://shop.test/p/5" }, defaults)
    ).rejects.toThrow(/^Invalid record: priceRegular:/);
  });
});
