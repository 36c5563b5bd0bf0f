// src/lib/services/salesAggregator.ts
import { saleTotal } from "@/lib/sale";
import type { Sale, SalesSummary } from "@/lib/types";

// Plain floating-point sums, no rounding: callers format to 2 decimals for display.

export function sumPaid(sales: readonly Sale[]): number {
  return sales.reduce((sum, sale) => sum + sale.paid, 0);
}

export function sumUnpaid(sales: readonly Sale[]): number {
  return sales.reduce((sum, sale) => sum + sale.unpaid, 0);
}

export function sumTotal(sales: readonly Sale[]): number {
  return sales.reduce((sum, sale) => sum + saleTotal(sale), 0);
}

export function summarizeSales(sales: readonly Sale[]): SalesSummary {
  return {
    paid: sumPaid(sales),
    unpaid: sumUnpaid(sales),
    total: sumTotal(sales),
    count: sales.length,
  };
}
