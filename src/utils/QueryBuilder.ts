import { ContainerListQuery } from '../types';

export const CONTAINERS_LIST_ENDPOINT = '/containers/json';
export const CONTAINERS_CREATE_ENDPOINT = '/containers/create';

/**
 * Build the query string for container listings.
 *
 * Parameters appear in the fixed order all, size, limit, filter and only
 * when set. The filter expression is percent-encoded.
 */
export function buildContainerListQuery(query: ContainerListQuery): string {
  const params: string[] = [];

  if (query.all) {
    params.push('all=true');
  }
  if (query.size) {
    params.push('size=true');
  }
  if (query.limit !== undefined) {
    params.push(`limit=${query.limit}`);
  }
  if (query.filter !== undefined) {
    params.push(`filter=${encodeURIComponent(query.filter)}`);
  }

  return params.length > 0 ? `?${params.join('&')}` : '';
}

/**
 * Without a name the daemon picks one
 */
export function buildCreateContainerPath(name: string): string {
  if (!name) {
    return CONTAINERS_CREATE_ENDPOINT;
  }
  return `${CONTAINERS_CREATE_ENDPOINT}?name=${encodeURIComponent(name)}`;
}
