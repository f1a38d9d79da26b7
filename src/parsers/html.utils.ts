/** Collapses runs of whitespace and trims. */
export const cleanText = (text: string | null | undefined): string =>
  text ? text.replace(/\s+/g, " ").trim() : "";

/**
 * Pulls a decimal price out of display text such as `$1,299.99`. Commas count
 * as decimal points; when several points remain, the last one is the decimal
 * separator and the others are thousands separators.
 */
export const extractPrice = (text: string | null | undefined): number | undefined => {
  if (!text) return undefined;

  let priceText = text.replace(/[^\d.,]/g, "").replace(/,/g, ".");
  const parts = priceText.split(".");
  if (parts.length > 2) {
    const decimals = parts.pop();
    priceText = `${parts.join("")}.${decimals ?? ""}`;
  }

  if (priceText === "") return undefined;
  const value = Number(priceText);
  return Number.isNaN(value) ? undefined : value;
};

export const resolveUrl = (href: string, base: string): string | undefined => {
  try {
    return new URL(href, base).toString();
  } catch {
    return undefined;
  }
};
