export type RandomSource = () => number;

const LOWERCASE = 'abcdefghijklmnopqrstuvwxyz';

export function generateRandomString(length: number = 20, random: RandomSource = Math.random): string {
  let result = '';
  for (let i = 0; i < length; i++) {
    result += LOWERCASE[Math.floor(random() * LOWERCASE.length)];
  }
  return result;
}

// Uniform in [min, max)
export function uniform(min: number, max: number, random: RandomSource = Math.random): number {
  return min + (max - min) * random();
}

export function pickRandom<T>(items: readonly T[], random: RandomSource = Math.random): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  return items[Math.floor(random() * items.length)];
}

// Distinct picks; never more than `items` holds
export function sampleWithoutReplacement<T>(items: readonly T[], count: number, random: RandomSource = Math.random): T[] {
  const pool = [...items];
  const picked: T[] = [];
  while (picked.length < count && pool.length > 0) {
    const index = Math.floor(random() * pool.length);
    picked.push(pool.splice(index, 1)[0]);
  }
  return picked;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
