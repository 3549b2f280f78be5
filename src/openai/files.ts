import { readFile } from "node:fs/promises";

import type OpenAI from "openai";
import { toFile } from "openai";

import type {
  ArtifactUploader,
  CapabilityProvisioner,
  ProvisionedContainer,
  SharedContainerRequest,
} from "../services.js";
import type { ArtifactDefinition, ArtifactHandle } from "../types.js";

export function createOpenAiArtifactUploader(client: OpenAI): ArtifactUploader {
  return {
    upload: async (artifact: ArtifactDefinition): Promise<ArtifactHandle> => {
      const file = await toFile(await readFile(artifact.path), artifact.fileName);
      const uploaded = await client.files.create({ file, purpose: "user_data" });
      return { artifactId: artifact.id, fileId: uploaded.id, fileName: artifact.fileName };
    },
  };
}

export type ContainerSummary = {
  readonly id: string;
  readonly name: string;
  readonly status: string;
};

/** The first live container carrying `displayName`, if any. */
export function findReusableContainer(
  containers: Iterable<ContainerSummary>,
  displayName: string,
): ContainerSummary | undefined {
  for (const container of containers) {
    if (container.name === displayName && container.status !== "expired") {
      return container;
    }
  }
  return undefined;
}

async function listContainers(client: OpenAI): Promise<ContainerSummary[]> {
  const containers: ContainerSummary[] = [];
  for await (const container of client.containers.list({ limit: 100 })) {
    containers.push({ id: container.id, name: container.name, status: container.status });
  }
  return containers;
}

/**
 * Looks a container up by display name and reuses it, attaching this run's
 * files; otherwise creates one seeded with them.
 */
export function createOpenAiContainerProvisioner(client: OpenAI): CapabilityProvisioner {
  return {
    provisionSharedContainer: async (
      request: SharedContainerRequest,
    ): Promise<ProvisionedContainer> => {
      const existing = findReusableContainer(await listContainers(client), request.displayName);
      if (existing) {
        for (const artifact of request.artifacts) {
          await client.containers.files.create(existing.id, { file_id: artifact.fileId });
        }
        return { containerId: existing.id, reused: true };
      }
      const created = await client.containers.create({
        name: request.displayName,
        file_ids: request.artifacts.map((artifact) => artifact.fileId),
      });
      return { containerId: created.id, reused: false };
    },
  };
}
