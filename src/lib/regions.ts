import { DescribeRegionsCommand } from "@aws-sdk/client-ec2";
import { getEC2Client } from "./aws-clients.js";
import type { Logger } from "./logger.js";
import type { Session } from "./session.js";
import { isValidRegionName } from "./validation-utils.js";

/**
 * Regions scanned when DescribeRegions cannot be called.
 * Covers North America, Europe, Asia Pacific and South America.
 */
export const FALLBACK_REGIONS: readonly string[] = [
  "us-east-1",
  "us-east-2",
  "us-west-1",
  "us-west-2",
  "eu-west-1",
  "eu-west-2",
  "eu-west-3",
  "eu-central-1",
  "ap-southeast-1",
  "ap-southeast-2",
  "ap-northeast-1",
  "ap-northeast-2",
  "ap-south-1",
  "ca-central-1",
  "sa-east-1",
];

/**
 * Lists the regions to scan for reservations.
 *
 * Calls EC2 DescribeRegions once in the session's metadata region. Any failure,
 * or a listing with no usable names, switches to {@link FALLBACK_REGIONS}
 * without retrying.
 *
 * @returns Region names in the order EC2 returned them
 */
export async function listRegions(
  session: Session,
  logger: Logger
): Promise<string[]> {
  const ec2 = getEC2Client({
    region: session.metadataRegion,
    credentials: session.credentials,
  });

  try {
    const response = await ec2.send(new DescribeRegionsCommand({}));

    const regions: string[] = [];
    for (const region of response.Regions ?? []) {
      const name = region.RegionName;
      if (!name) {
        continue;
      }
      if (!isValidRegionName(name)) {
        logger.warn("Skipping invalid region name", { regionName: name });
        continue;
      }
      regions.push(name);
    }

    if (regions.length > 0) {
      return regions;
    }

    logger.info("DescribeRegions returned no regions, using fallback regions", {
      metadataRegion: session.metadataRegion,
      fallbackCount: FALLBACK_REGIONS.length,
    });
  } catch (error) {
    logger.info("Region listing failed, using fallback regions", {
      metadataRegion: session.metadataRegion,
      fallbackCount: FALLBACK_REGIONS.length,
      error: error instanceof Error ? error : String(error),
    });
  }

  return [...FALLBACK_REGIONS];
}
