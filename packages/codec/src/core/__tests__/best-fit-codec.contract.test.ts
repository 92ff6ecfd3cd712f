import { describeCodecContract } from "../../ports/__tests__/codec.contract"
import { BestFitCodec } from "../best-fit-codec"

describeCodecContract({ name: "BestFitCodec", make: () => new BestFitCodec() })

describeCodecContract({
  name: "BestFitCodec (serializeAsString)",
  make: () => new BestFitCodec({ defaultFlags: { serializeAsString: "true" } }),
})
