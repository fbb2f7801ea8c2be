import { readdir } from "node:fs/promises";
import { join } from "node:path";
import type { EventLogger, LoggerService } from "@sheet-intake/job-base";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FakeMailbox } from "../../__tests__/fake-mailbox.js";
import {
	type TempWorkspace,
	createMockEventLogger,
	createMockLogger,
	createTempWorkspace,
	writeRegistry,
} from "../../__tests__/helpers.js";
import { rawMessage } from "../../__tests__/messages.js";
import { IntakeService } from "../../intake/intake.service.js";
import { SenderRegistry } from "../../registry/sender-registry.js";
import { SequenceStore } from "../../registry/sequence.store.js";
import { StorageService } from "../../storage/storage.service.js";
import { MailboxService } from "../mailbox.service.js";

const sheet = (text: string) => ({
	filename: "records.xlsx",
	content: Buffer.from(text),
});

describe("MailboxService", () => {
	let workspace: TempWorkspace;
	let logger: LoggerService;
	let events: EventLogger;
	let mailbox: FakeMailbox;
	let registry: SenderRegistry;
	let service: MailboxService;

	beforeEach(async () => {
		workspace = await createTempWorkspace();
		logger = createMockLogger();
		events = createMockEventLogger();
		mailbox = new FakeMailbox();
		const storage = new StorageService(logger);
		await storage.ensureDirectories([workspace.staging]);
		await writeRegistry(workspace.registryPath, { "a@x.org": { code: "AX" } });
		registry = await SenderRegistry.load(workspace.registryPath, storage, logger);
		const intake = new IntakeService(
			workspace.staging,
			registry,
			new SequenceStore(registry, logger),
			storage,
			logger,
			events,
		);
		service = new MailboxService(() => mailbox, registry, intake, logger, events);
	});

	afterEach(async () => {
		await workspace.cleanup();
	});

	it("should stage attachments and mark the message read", async () => {
		mailbox.add(
			7,
			rawMessage({
				returnPath: "<a@x.org>",
				attachments: [sheet("first"), sheet("second")],
			}),
		);

		const result = await service.collect();

		expect(result.staged).toBe(2);
		expect(result.messages).toBe(1);
		expect([...result.ownership]).toEqual([
			[join(workspace.staging, "AX_1.xlsx"), "a@x.org"],
			[join(workspace.staging, "AX_2.xlsx"), "a@x.org"],
		]);
		expect(mailbox.seen.has(7)).toBe(true);
		expect(mailbox.opened && mailbox.closed).toBe(true);
	});

	it("should leave messages from unknown senders unread", async () => {
		mailbox.add(
			3,
			rawMessage({ returnPath: "<z@unknown.com>", attachments: [sheet("x")] }),
		);

		const result = await service.collect();

		expect(result).toMatchObject({ staged: 0, skipped: 1, failed: 0 });
		expect(mailbox.seen.size).toBe(0);
		expect(await readdir(workspace.staging)).toEqual([]);
		expect(registry.getSequence("a@x.org")).toBeUndefined();
		expect(events.attachmentRejected).toHaveBeenCalledWith(
			"z@unknown.com",
			"unknown_sender",
		);
	});

	it("should mark a message read even when a part was rejected", async () => {
		mailbox.add(
			4,
			rawMessage({
				returnPath: "<a@x.org>",
				attachments: [sheet("data"), { filename: "empty.xlsx", content: Buffer.alloc(0) }],
			}),
		);

		const result = await service.collect();

		expect(result.staged).toBe(1);
		expect(mailbox.seen.has(4)).toBe(true);
	});

	it("should keep going after a message fails", async () => {
		mailbox
			.add(1, rawMessage({ returnPath: "<a@x.org>", attachments: [sheet("a")] }))
			.add(2, rawMessage({ returnPath: "<a@x.org>", attachments: [sheet("b")] }))
			.breakMessage(1);

		const result = await service.collect();

		expect(result).toMatchObject({ messages: 2, staged: 1, failed: 1 });
		expect([...mailbox.seen]).toEqual([2]);
		expect(logger.error).toHaveBeenCalledWith(
			"Message handling failed, left unread",
			expect.objectContaining({ uid: 1, error_code: "unexpected_error" }),
		);
		expect(mailbox.closed).toBe(true);
	});

	it("should close the connection when the mailbox cannot be selected", async () => {
		mailbox.failOpen(new Error("Mailbox does not exist"));

		await expect(service.collect()).rejects.toThrow("Mailbox does not exist");

		expect(mailbox.opened).toBe(true);
		expect(mailbox.closed).toBe(true);
	});
});
