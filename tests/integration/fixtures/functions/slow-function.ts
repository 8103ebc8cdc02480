import type { ResourceList } from '@fnpipe/sdk';

export default async function (input: ResourceList): Promise<ResourceList> {
  await new Promise(resolve => setTimeout(resolve, 2000));
  return input;
}
