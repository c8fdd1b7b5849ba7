export { ExpiredError } from "./ExpiredError.js";
export { InsufficientResourceError } from "./InsufficientResourceError.js";
export { InvalidSessionStateError } from "./InvalidSessionStateError.js";
export { NotFoundError, type NotFoundResource } from "./NotFoundError.js";
export { StateConflictError, type StateConflictReason } from "./StateConflictError.js";
export { ValidationError } from "./ValidationError.js";
