/**
 * Result types of the image upload + label detection step.
 */

export interface ImageLabel {
  name: string;
  /** Confidence score in percent (0-100) */
  confidence: number;
}

export interface ImageAnalysis {
  presignedUrl: string;
  labels: ImageLabel[];
}

export interface ImageAnalysisError {
  error: string;
}

export type ImageAnalysisResult = ImageAnalysis | ImageAnalysisError;

/**
 * Response for POST /api/recipes/:id/upload-image.
 */
export interface RecipeImageResponse extends ImageAnalysis {
  image: string;
}
