/**
 * Social Events API - HTTP Module
 *
 * @module http
 */

export {
    createHandler,
    publicRoute,
    authenticatedRoute,
    pathParam,
    queryParam,
} from './router';

export type {
    ApiRequest,
    RequestContext,
    AuthenticatedContext,
    Route,
    RouteTable,
    ApiHandler,
} from './router';
