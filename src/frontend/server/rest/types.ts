/**
 * @file REST Handler Types
 *
 * Shared interfaces for REST request handling and route modules.
 *
 * @module
 */

import http from 'http';
import type { SessionExecutionEngine } from '../../../core/engine/SessionExecutionEngine.js';

export interface RestHandlerDeps {
    engine: SessionExecutionEngine;
    host: string;
    port: number;
}

export interface RestRouteContext {
    req: http.IncomingMessage;
    res: http.ServerResponse;
    deps: RestHandlerDeps;
    url: URL;
    pathname: string;
    method: string;
    engine: SessionExecutionEngine;
}

export type RestRouteHandler = (context: RestRouteContext) => Promise<boolean>;
