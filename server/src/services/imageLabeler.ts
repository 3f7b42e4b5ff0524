/**
 * Image storage + label detection collaborator.
 *
 * After a recipe image reference is saved, the image bytes are uploaded to
 * S3 under `<email local part>/<filename>`, a presigned GET URL is issued and
 * Rekognition is asked for the labels it sees in the stored object.
 * Failures are returned as `{ error }` values for the caller to report; they
 * are never retried here.
 */

import { S3Client, PutObjectCommand, GetObjectCommand } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { RekognitionClient, DetectLabelsCommand } from '@aws-sdk/client-rekognition';
import type { ImageAnalysisResult, ImageLabel } from '@larder/shared';
import type { AwsConfig } from '../plugins/config.js';
import { IMAGE_URL_EXPIRY_SECONDS, MAX_IMAGE_LABELS } from '../constants.js';

export interface ImageAnalysisInput {
  userEmail: string;
  filename: string;
  contentType: string;
  data: Buffer;
  recipeId: number;
}

export interface ImageLabeler {
  analyze(input: ImageAnalysisInput): Promise<ImageAnalysisResult>;
}

/**
 * Object key for an upload: the part of the email before '@', then the file name.
 */
export function buildObjectKey(userEmail: string, filename: string): string {
  const at = userEmail.indexOf('@');
  const owner = at === -1 ? userEmail : userEmail.slice(0, at);
  return `${owner}/${filename}`;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * S3 + Rekognition implementation.
 */
export class AwsImageLabeler implements ImageLabeler {
  private readonly s3: S3Client;
  private readonly rekognition: RekognitionClient;
  private readonly bucket: string;

  constructor(config: AwsConfig, clients?: { s3?: S3Client; rekognition?: RekognitionClient }) {
    const credentials = {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    };
    this.bucket = config.bucket;
    this.s3 = clients?.s3 ?? new S3Client({ region: config.region, credentials });
    this.rekognition =
      clients?.rekognition ?? new RekognitionClient({ region: config.region, credentials });
  }

  async analyze(input: ImageAnalysisInput): Promise<ImageAnalysisResult> {
    const key = buildObjectKey(input.userEmail, input.filename);

    try {
      await this.s3.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: input.data,
          ContentType: input.contentType,
        }),
      );
    } catch (err) {
      return { error: `Image upload failed: ${describeError(err)}` };
    }

    let presignedUrl: string;
    try {
      presignedUrl = await getSignedUrl(
        this.s3,
        new GetObjectCommand({ Bucket: this.bucket, Key: key }),
        { expiresIn: IMAGE_URL_EXPIRY_SECONDS },
      );
    } catch (err) {
      return { error: `Could not sign image URL: ${describeError(err)}` };
    }

    let labels: ImageLabel[];
    try {
      const response = await this.rekognition.send(
        new DetectLabelsCommand({
          Image: { S3Object: { Bucket: this.bucket, Name: key } },
          MaxLabels: MAX_IMAGE_LABELS,
        }),
      );
      labels = (response.Labels ?? []).map((label) => ({
        name: label.Name ?? '',
        confidence: label.Confidence ?? 0,
      }));
    } catch (err) {
      return { error: `Label detection failed: ${describeError(err)}` };
    }

    return { presignedUrl, labels };
  }
}

/**
 * Used when no AWS credentials are configured: every call reports the missing credentials.
 */
export class UnconfiguredImageLabeler implements ImageLabeler {
  async analyze(): Promise<ImageAnalysisResult> {
    return { error: 'Image storage credentials not available' };
  }
}

export function createImageLabeler(aws: AwsConfig | undefined): ImageLabeler {
  return aws ? new AwsImageLabeler(aws) : new UnconfiguredImageLabeler();
}
