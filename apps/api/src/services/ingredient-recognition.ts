export interface RecognitionCandidate {
  name: string;
  confidence: number;
}

export interface RecognitionOutput {
  candidates: RecognitionCandidate[];
  // seconds
  processingTime: number;
}

export interface IngredientRecognizer {
  recognize(imageUrl: string): Promise<RecognitionOutput>;
}

// Stand-in until an image model is wired up; always reports the same two items
const MOCK_CANDIDATES: RecognitionCandidate[] = [
  { name: 'Tomato', confidence: 0.95 },
  { name: 'Egg', confidence: 0.88 },
];

export class MockIngredientRecognizer implements IngredientRecognizer {
  async recognize(_imageUrl: string): Promise<RecognitionOutput> {
    return {
      candidates: MOCK_CANDIDATES.map((candidate) => ({ ...candidate })),
      processingTime: 1.2,
    };
  }
}
