// TokenEstimator: local fallback when the injected counter is missing or fails
export class TokenEstimator {
    private static charsPerToken = 4;
    private static tokensPerWord = 1.3;

    /**
     * Character and word based estimate; the larger of the two wins.
     * Roughly four characters per token, about 1.3 tokens per word.
     */
    estimate(content: string): number {
        if (!content) { return 0; }

        const charEstimate = Math.floor(content.length / TokenEstimator.charsPerToken);
        const words = content.match(/\S+/g);
        const wordEstimate = Math.floor((words ? words.length : 0) * TokenEstimator.tokensPerWord);

        return Math.max(charEstimate, wordEstimate);
    }

    /**
     * Scale an estimate of a leading sample up to the whole file. A heuristic
     * with no accuracy bound: files whose head differs from their body (license
     * banners, generated tables) can be far off.
     */
    estimateFromSample(sample: string, sampleBytes: number, totalBytes: number): number {
        const sampleEstimate = this.estimate(sample);
        if (sampleBytes <= 0 || totalBytes <= 0) {
            return sampleEstimate;
        }
        return Math.floor(sampleEstimate * (totalBytes / sampleBytes));
    }
}
