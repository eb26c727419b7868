export const ErrorCode = {
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  CONFIG_INVALID: 'CONFIG_INVALID',
  RUN_CANCELLED: 'RUN_CANCELLED',

  VCENTER_NETWORK_ERROR: 'VCENTER_NETWORK_ERROR',
  VCENTER_BAD_RESPONSE: 'VCENTER_BAD_RESPONSE',
  VCENTER_AUTH_FAILED: 'VCENTER_AUTH_FAILED',
  VCENTER_PERMISSION_DENIED: 'VCENTER_PERMISSION_DENIED',
  VCENTER_INVENTORY_FAILED: 'VCENTER_INVENTORY_FAILED',
  VCENTER_CATALOG_FAILED: 'VCENTER_CATALOG_FAILED',
  VCENTER_METRIC_NOT_FOUND: 'VCENTER_METRIC_NOT_FOUND',
  VCENTER_QUERY_FAILED: 'VCENTER_QUERY_FAILED',
  VCENTER_EXTRACTION_MISMATCH: 'VCENTER_EXTRACTION_MISMATCH',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];
