import { BadRequestException } from '@nestjs/common';
import { LIVENESS_STATES, Liveness, TargetSelector } from '../targets/target.types';

export interface DeploymentRequest {
  selector: TargetSelector;
  imageRef: string;
}

// A leading '-' would reach docker as an option.
const IMAGE_REF = /^[^\s-]\S*$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates a POST /deployments body. At least one label is required so a request can
 * never select the whole fleet by accident.
 */
export function parseDeploymentRequest(body: unknown): DeploymentRequest {
  if (!isRecord(body)) throw new BadRequestException('Body must be a JSON object');

  const { selector, imageRef } = body;
  if (typeof imageRef !== 'string' || !IMAGE_REF.test(imageRef)) {
    throw new BadRequestException("imageRef must be an image reference without spaces or a leading '-'");
  }
  if (!isRecord(selector) || !isRecord(selector.labels)) {
    throw new BadRequestException('selector.labels must be an object of label values');
  }

  const labels: Record<string, string> = {};
  for (const [key, value] of Object.entries(selector.labels)) {
    if (typeof value !== 'string') {
      throw new BadRequestException(`selector.labels.${key} must be a string`);
    }
    labels[key] = value;
  }
  if (Object.keys(labels).length === 0) {
    throw new BadRequestException('selector.labels must name at least one label');
  }

  let liveness: Liveness | undefined;
  if (selector.liveness !== undefined) {
    liveness = LIVENESS_STATES.find((state) => state === selector.liveness);
    if (!liveness) {
      throw new BadRequestException(`selector.liveness must be one of ${LIVENESS_STATES.join(', ')}`);
    }
  }

  return { selector: liveness ? { labels, liveness } : { labels }, imageRef };
}
