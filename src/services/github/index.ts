/**
 * GitHub Service API - Public Interface
 *
 * REST client, Link-header pagination and the organization/repository
 * listings built on them.
 *
 * @module services/github
 */

export { makeClient, type GithubClient, type ClientOptions } from './client';

export { parseLinkHeader, findRelation } from './linkHeader';

export { fetchAll, withQueryParams, type FetchAllOptions, type QueryParams } from './pagination';

export {
  listOrganizations,
  listRepositories,
  decodeOrganizations,
  decodeRepositories,
  type ListOrganizationsOptions,
  type ListRepositoriesOptions
} from './repositories';
