const ONES = [
  'zero', 'one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight', 'nine',
  'ten', 'eleven', 'twelve', 'thirteen', 'fourteen', 'fifteen', 'sixteen',
  'seventeen', 'eighteen', 'nineteen',
];

const TENS = ['', '', 'twenty', 'thirty', 'forty', 'fifty', 'sixty', 'seventy', 'eighty', 'ninety'];

function belowHundred(n: number): string {
  if (n < 20) {
    return ONES[n];
  }
  const tens = TENS[Math.floor(n / 10)];
  const rest = n % 10;
  return rest === 0 ? tens : `${tens}-${ONES[rest]}`;
}

function belowThousand(n: number): string {
  const hundreds = Math.floor(n / 100);
  const rest = n % 100;
  if (hundreds === 0) {
    return belowHundred(rest);
  }
  const head = `${ONES[hundreds]} hundred`;
  return rest === 0 ? head : `${head} and ${belowHundred(rest)}`;
}

/**
 * English cardinal for a non-negative integer below one million,
 * e.g. 21 -> "twenty-one".
 */
export function numberToWords(value: number): string {
  if (!Number.isInteger(value) || value < 0 || value >= 1_000_000) {
    throw new RangeError(`Cannot spell out ${value}`);
  }
  const thousands = Math.floor(value / 1000);
  const rest = value % 1000;
  if (thousands === 0) {
    return belowThousand(rest);
  }
  const head = `${belowThousand(thousands)} thousand`;
  if (rest === 0) {
    return head;
  }
  return rest < 100 ? `${head} and ${belowHundred(rest)}` : `${head} ${belowThousand(rest)}`;
}
