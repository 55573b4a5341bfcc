import { describeSinkContract } from "../../../ports/__tests__/sink.contract"
import { StringSink } from "../string-sink"

describeSinkContract({
  name: "StringSink",
  make: () => {
    const sink = new StringSink()
    return { sink, read: () => sink.toString() }
  },
})
