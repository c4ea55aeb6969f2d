import { describeStorageBackendContract } from "../../../ports/__tests__/storage-backend.contract"
import { SingleSlotBackend } from "../single-slot-backend"

describeStorageBackendContract("SingleSlotBackend", (clock) => new SingleSlotBackend({ clock }))
