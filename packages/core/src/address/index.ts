export {
  parseAddress,
  formatAddress,
  dialArgs,
  fromSocketAddress,
  normalizeAddress,
  type AddressDescriptor,
  type AddressFamily,
  type DialArgs,
} from "./descriptor.js";
