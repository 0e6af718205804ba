import { container } from "tsyringe";
import { IFaqRepository } from "../data/interfaces/IFaqRepository";
import { JsonFaqRepository } from "../data/repositories/JsonFaqRepository";
import { FaqRetrievalService } from "../business/services/FaqRetrievalService";
import { SentimentModelLoader } from "../business/services/SentimentModelLoader";
import { SentimentService } from "../business/services/SentimentService";
import { IntentDetector } from "../business/services/IntentDetector";
import { RestaurantActionPolicy } from "../business/services/RestaurantActionPolicy";
import { CouponService } from "../business/services/CouponService";
import { RefundService } from "../business/services/RefundService";
import { ChatService } from "../business/services/ChatService";

// Register business services. The FAQ index and the sentiment model are loaded
// once per process, so their owners are singletons.
container.registerSingleton(FaqRetrievalService, FaqRetrievalService);
container.registerSingleton(SentimentService, SentimentService);
container.register(SentimentModelLoader, { useClass: SentimentModelLoader });
container.register(IntentDetector, { useClass: IntentDetector });
container.register(RestaurantActionPolicy, { useClass: RestaurantActionPolicy });
container.register(CouponService, { useClass: CouponService });
container.register(RefundService, { useClass: RefundService });
container.register(ChatService, { useClass: ChatService });

// Register data repositories
container.register<IFaqRepository>("IFaqRepository", {
    useClass: JsonFaqRepository,
});
