// Type declarations for the parts of jstat this library calls

declare module 'jstat' {
  export interface jStat {
    binomial: {
      pdf(k: number, n: number, p: number): number;
    };

    // Regularized incomplete beta I_x(a, b), for x in [0, 1]
    ibeta(x: number, a: number, b: number): number;
  }

  const jStat: jStat;
  export default jStat;
}
