import { describeNodeClientContract } from "../../../ports/__tests__/node-client.contract"
import { nodes } from "../../../tests/utils/cache-test-helpers"
import { MemoryCluster } from "../memory-cluster"
import { MemoryNodeClient } from "../memory-node-client"

describeNodeClientContract("MemoryNodeClient", () => {
  const cluster = new MemoryCluster<string>()
  const list = [nodes.first(), nodes.second()]

  for (const node of list) cluster.addNode(node)

  return new MemoryNodeClient(cluster, list)
})
