export { fetchTextWithTimeout, HttpTimeoutError } from './http-client';
