export function load(path: string): string {
  try {
    return path.trim();
  } catch (err) {
  }
  return "";
}

export function build(a: number, b: number, c: number, d: number, e: number, f: number): number {
  return a + b + c + d + e + f;
}

const apiKey = "test-secret";
console.log(apiKey);
