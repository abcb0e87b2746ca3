export {
	type Signer,
	SigningCapability,
	createSigningCapability,
	unwrapSigningCapability,
} from "./signing-capability.js";
