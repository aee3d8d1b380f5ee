/**
 * Web Module
 *
 * HTTP upload front end for reconciliations.
 *
 * @module
 */

export { ReconcileServer, startReconcileServer, FORM_FIELDS, type ReconcileServerDeps } from "./server.js";
