// fft.js ships no type declarations.
declare module "fft.js" {
    class FFT {
        constructor(size: number);
        createComplexArray(): number[];
        realTransform(out: number[], data: ArrayLike<number>): void;
        completeSpectrum(out: number[]): void;
    }
    export = FFT;
}
