export function mean(values: readonly number[]): number {
  if (!values.length) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Bessel-corrected sample standard deviation; 0 for fewer than two samples. */
export function sampleStandardDeviation(values: readonly number[]): number {
  if (values.length < 2) {
    return 0;
  }
  const average = mean(values);
  const squares = values.reduce((sum, value) => sum + (value - average) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

export function histogram(values: readonly number[], buckets: number): number[] {
  const counts = new Array<number>(buckets).fill(0);
  values.forEach((value) => {
    if (value >= 0 && value < buckets) {
      counts[value] += 1;
    }
  });
  return counts;
}
