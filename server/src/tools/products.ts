import catalog from "./data/products.json";
import type { ToolResult } from "./types";

export type ProductSort = "price_asc" | "price_desc" | "popularity" | "rating";

export interface Product {
  id: number;
  name: string;
  price: number;
  category: string;
  rating: number;
}

export interface ProductSearch {
  query: string;
  category?: string;
  maxPrice?: number;
  sortBy?: ProductSort;
}

// Catalogue order is popularity order.
const PRODUCTS: readonly Product[] = catalog;

export function searchProducts(search: ProductSearch): ToolResult {
  const query = search.query.toLowerCase();
  const sortBy = search.sortBy ?? "popularity";

  let results = PRODUCTS.filter((p) => p.name.toLowerCase().includes(query));
  if (search.category) {
    const category = search.category.toLowerCase();
    results = results.filter((p) => p.category.toLowerCase() === category);
  }
  if (search.maxPrice !== undefined) {
    const maxPrice = search.maxPrice;
    results = results.filter((p) => p.price <= maxPrice);
  }

  if (sortBy === "price_asc") {
    results = [...results].sort((a, b) => a.price - b.price);
  } else if (sortBy === "price_desc") {
    results = [...results].sort((a, b) => b.price - a.price);
  } else if (sortBy === "rating") {
    results = [...results].sort((a, b) => b.rating - a.rating);
  }

  return {
    query: search.query,
    category: search.category ?? null,
    max_price: search.maxPrice ?? null,
    sort_by: sortBy,
    count: results.length,
    results,
  };
}
