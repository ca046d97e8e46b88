/**
 * Restricts which RPC methods a transport will send.
 */
export interface MethodFilter {
  /** When non-empty, only these methods are allowed */
  include?: readonly string[];
  /** Always rejected, even when also listed in `include` */
  exclude?: readonly string[];
}

export function isMethodAllowed(filter: MethodFilter | undefined, method: string): boolean {
  if (!filter) return true;
  if (filter.exclude?.includes(method)) return false;
  if (filter.include && filter.include.length > 0) {
    return filter.include.includes(method);
  }
  return true;
}
