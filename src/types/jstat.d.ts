// Type declarations for the parts of jstat this package calls

declare module 'jstat' {
  export interface jStat {
    studentt: {
      cdf(x: number, dof: number): number;
    };

    centralF: {
      cdf(x: number, df1: number, df2: number): number;
    };

    sum(data: readonly number[]): number;
    mean(data: readonly number[]): number;
    median(data: readonly number[]): number;
    variance(data: readonly number[], sample?: boolean): number;
  }

  const jStat: jStat;
  export default jStat;
}
