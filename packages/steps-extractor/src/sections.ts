/**
 * Seller and buyer blocks of an e-Faktur form
 */
export interface PartySections {
  readonly seller?: string;
  readonly buyer?: string;
}

const SELLER_HEADING = /Pengusaha Kena Pajak/i;
const BUYER_HEADING = /Pembeli Barang Kena Pajak/i;

/**
 * Split text at the party headings. The seller block runs from its heading to
 * the buyer heading; the buyer block runs to the end of the text.
 */
export function splitPartySections(text: string): PartySections {
  const sellerStart = text.search(SELLER_HEADING);
  const buyerStart = text.search(BUYER_HEADING);
  const sections: { seller?: string; buyer?: string } = {};

  if (sellerStart >= 0) {
    sections.seller = text.slice(sellerStart, buyerStart > sellerStart ? buyerStart : text.length);
  }
  if (buyerStart >= 0) {
    sections.buyer = text.slice(buyerStart, sellerStart > buyerStart ? sellerStart : text.length);
  }
  return sections;
}
