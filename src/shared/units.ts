/**
 * Token units: conversion between whole-token decimals and chain base units.
 *
 * The chain counts balances in rao (10^9 per token) and prices in rao per
 * whole alpha. Conversions to base units truncate; the chain never sees a
 * fractional rao.
 */

import { Decimal } from "./decimal.js";

export const BASE_UNIT_DECIMALS = 9;

const BASE_UNITS_PER_TOKEN = Decimal.from("1000000000");

const INTEGER_RE = /^\d+$/;

/** Whole-token amount to an integer base-unit string. */
export function toBaseUnits(amount: Decimal): string {
	return amount.mul(BASE_UNITS_PER_TOKEN).truncate(0).toString();
}

/**
 * Base-unit amount (as delivered by the chain: digits or a safe integer) to
 * whole tokens. Returns null for anything that is not a non-negative integer.
 */
export function fromBaseUnits(raw: string | number | bigint): Decimal | null {
	if (typeof raw === "bigint") {
		return raw < 0n ? null : Decimal.from(raw.toString()).div(BASE_UNITS_PER_TOKEN);
	}
	if (typeof raw === "number") {
		if (!Number.isSafeInteger(raw) || raw < 0) return null;
		return Decimal.from(raw).div(BASE_UNITS_PER_TOKEN);
	}
	const trimmed = raw.trim();
	if (!INTEGER_RE.test(trimmed)) return null;
	return Decimal.from(trimmed).div(BASE_UNITS_PER_TOKEN);
}
