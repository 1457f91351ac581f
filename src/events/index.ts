export type {
	BorrowRejectedEvent,
	BorrowedEvent,
	DepositedEvent,
	LedgerEventType,
	LedgerEvents,
	MarketUpdatedEvent,
	PositionOpenedEvent,
	PriceSourceSetEvent,
} from "./ledger-events.js";
