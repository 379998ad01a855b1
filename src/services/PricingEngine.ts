// ============================================
// Pricing Configuration
// ============================================

export interface PriceConfig {
    maxStock: number;        // stock level that counts as "full" (ratio = 1)
    minPrice: number;        // floor applied before truncation
    elasticity: number;      // higher => price drops faster as stock rises
    currencySymbol: string;  // presentation only
}

export const DEFAULT_PRICE_CONFIG: PriceConfig = {
    maxStock: 1000,
    minPrice: 1,
    elasticity: 1.2,
    currencySymbol: '$',
};

export interface ItemPrice {
    item: string;
    basePrice: number;
}

/**
 * Read-only view of base prices the engine quotes from.
 */
export interface PriceCatalog {
    basePriceOf(item: string): number | null;
    priceConfig(): PriceConfig;
}

// ============================================
// Elastic Price
// ============================================

/**
 * price = floor(max(minPrice, base / (1 + elasticity * stock / maxStock)))
 *
 * Null when the item is not for sale (no base price, or base <= 0).
 * Weakly decreasing in stock; equals floor(base) at zero stock.
 */
export function computeUnitPrice(
    basePrice: number | null | undefined,
    stock: number,
    config: PriceConfig
): number | null {
    if (basePrice === null || basePrice === undefined || !(basePrice > 0)) {
        return null;
    }
    const maxStock = config.maxStock > 0 ? config.maxStock : DEFAULT_PRICE_CONFIG.maxStock;
    const elasticity = config.elasticity >= 0 ? config.elasticity : DEFAULT_PRICE_CONFIG.elasticity;
    const minPrice = config.minPrice >= 0 ? config.minPrice : DEFAULT_PRICE_CONFIG.minPrice;

    const ratio = Math.max(0, Number.isFinite(stock) ? stock : 0) / maxStock;
    const raw = basePrice / (1 + elasticity * ratio);
    return Math.floor(Math.max(minPrice, raw));
}

export class PricingEngine {
    constructor(private readonly catalog: PriceCatalog) { }

    price(item: string, stock: number): number | null {
        return computeUnitPrice(this.catalog.basePriceOf(item), stock, this.catalog.priceConfig());
    }
}

export function formatAmount(amount: number, config: Pick<PriceConfig, 'currencySymbol'>): string {
    return `${config.currencySymbol}${amount}`;
}
