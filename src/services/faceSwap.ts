import { ForbiddenError, NotFoundError, PreconditionError } from "../errors.js";
import { logger } from "../logger.js";
import type { ListingStore } from "../repository/listings.js";
import type { SyncJobRunner } from "./syncJobRunner.js";

export interface FaceSwapRequest {
  userId: string;
  listingId: string;
  /** The face donor, typically the caller's selfie. */
  imageUrl: string;
}

export interface FaceSwapResponse {
  display_image_url: string;
}

/**
 * Synchronous face anonymisation for a listing photo. The listing is only written once the
 * prediction has produced an image, so a failed or timed out run leaves it untouched.
 */
export class FaceSwapService {
  constructor(
    private readonly listings: ListingStore,
    private readonly runner: SyncJobRunner,
    private readonly modelVersion: string
  ) {}

  async generate(request: FaceSwapRequest): Promise<FaceSwapResponse> {
    const { userId, listingId, imageUrl } = request;

    const listing = await this.listings.get(listingId);
    if (!listing) {
      throw new NotFoundError(`Listing '${listingId}' not found.`);
    }
    if (listing.lenderId !== userId) {
      throw new ForbiddenError("You can only apply face swap to your own listings.");
    }
    if (!listing.imageUrl) {
      throw new PreconditionError("The listing does not have a base image to swap onto.");
    }

    const result = await this.runner.run(this.modelVersion, {
      source_image: imageUrl,
      target_image: listing.imageUrl,
    });

    await this.listings.setDisplayImage(listingId, result.outputUrl);
    logger.info({ listingId, userId, predictionId: result.predictionId, attempts: result.attempts }, "Listing face swap applied");

    return { display_image_url: result.outputUrl };
  }
}
