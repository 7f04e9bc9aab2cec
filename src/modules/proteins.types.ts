import type { InteractionRow, LocationCategory, SearchHit } from "../../services/types.ts";

export interface SearchResponse {
  results: SearchHit[];
}

export interface ProteinResponse {
  id: string;
  displayName: string;
}

export interface CategoriesResponse {
  categories: LocationCategory[];
}

export interface InteractionsResponse {
  id: string;
  displayName: string;
  interactions: InteractionRow[];
}

export interface CsvExport {
  fileName: string;
  body: string;
}

export interface BadRequest {
  error: string;
  status: 400;
}
