import { z } from "zod"
import { describeNodeClientContract } from "../../../ports/__tests__/node-client.contract"
import { nodes } from "../../../tests/utils/cache-test-helpers"
import { FakeMemcached } from "../../../tests/utils/fake-memcached"
import { MemcachedNodeClient } from "../memcached-node-client"

describeNodeClientContract(
  "MemcachedNodeClient",
  () =>
    new MemcachedNodeClient(
      { client: new FakeMemcached() },
      { batchSize: 2, valueSchema: z.string() },
      [nodes.first()],
    ),
)
