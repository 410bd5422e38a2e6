/**
 * Error taxonomy shared by every stage and adapter.
 *
 * - **validation**   – bad input, user-correctable, never retried
 * - **transient**    – network / 5xx / timeout, retried with bounded backoff
 * - **auth_expired** – provider rejected the credential, routed to re-authorization
 * - **permanent**    – quota / path / unsupported content, terminal
 * - **internal**     – unexpected programmer error, terminal and always logged
 */
export type ErrorClass = "validation" | "transient" | "auth_expired" | "permanent" | "internal";
