/**
 * API Request/Response Types
 */

// ============================================================================
// Error Response
// ============================================================================

export interface ApiError {
  error: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

// ============================================================================
// Resource DTOs
// ============================================================================

export interface RegionDto {
  id: number;
  name: string;
  excluded: boolean;
}

export interface RawFileDto {
  fileName: string;
  localRegionId: number | null;
  regionId: number | null;
  regionName: string | null;
  excluded: boolean;
}
