// Phone identifiers arrive in whatever shape the gateway or a human typed them.
// Everything downstream matches on the canonical form: international digits, no '+'.

export interface CountryRule {
  callingCode: string;
  trunkPrefix: string;
  nationalLengths: number[]; // subscriber number without trunk prefix
  mobilePattern: RegExp;
}

const COUNTRY_RULES: Record<string, CountryRule> = {
  israel: { callingCode: '972', trunkPrefix: '0', nationalLengths: [9, 10], mobilePattern: /^5/ },
  'united kingdom': { callingCode: '44', trunkPrefix: '0', nationalLengths: [10], mobilePattern: /^7/ },
};

export function countryRule(country: string): CountryRule | undefined {
  return COUNTRY_RULES[country.trim().toLowerCase()];
}

function digitsOnly(raw: string) {
  return raw.replace(/\D/g, '');
}

/**
 * Normalizes a raw identifier to its canonical key.
 * Total: unrecognized shapes come back as cleaned digits.
 *
 * @example canonicalize('050-123-4567', 'Israel') // '972501234567'
 */
export function canonicalize(raw: string, country: string): string {
  const clean = digitsOnly(raw);
  const rule = countryRule(country);
  if (!rule) return clean;
  if (rule.trunkPrefix && clean.startsWith(rule.trunkPrefix)) {
    return rule.callingCode + clean.slice(rule.trunkPrefix.length);
  }
  if (clean.startsWith(rule.callingCode)) return clean;
  if (rule.nationalLengths.includes(clean.length) && rule.mobilePattern.test(clean)) {
    return rule.callingCode + clean;
  }
  return clean;
}

/** Local trunk rendering of a canonical key (972501234567 -> 0501234567). */
export function localRendering(key: string, country: string): string {
  const rule = countryRule(country);
  if (!rule || !key.startsWith(rule.callingCode)) return key;
  return rule.trunkPrefix + key.slice(rule.callingCode.length);
}

export function formatForDisplay(raw: string, country: string): string {
  const local = localRendering(digitsOnly(raw), country);
  if (countryRule(country)) {
    if (local.length === 10) return `${local.slice(0, 3)}-${local.slice(3, 6)}-${local.slice(6)}`;
    if (local.length === 9) return `${local.slice(0, 2)}-${local.slice(2, 5)}-${local.slice(5)}`;
  }
  return local.match(/.{1,3}/g)?.join('-') ?? local;
}

export function areEquivalent(a: string, b: string, country: string): boolean {
  return canonicalize(a, country) === canonicalize(b, country);
}
