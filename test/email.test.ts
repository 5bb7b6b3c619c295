import { describe, expect, it, vi } from "vitest";
import { DeliveryError } from "../src/errors.js";
import { buildHtml, createEmailTransport, toPlainText } from "../src/email.js";

const { sendMail } = vi.hoisted(() => ({ sendMail: vi.fn() }));

vi.mock("nodemailer", () => ({
  default: { createTransport: () => ({ sendMail }) },
}));

const message = [
  "🏠 *New listing in Creek Harbour!*",
  "",
  "1BR \\_corner\\_ unit",
  "",
  "🔗 [Open listing](https://example.test/a?b=1&c=2)",
].join("\n");

const options = {
  host: "smtp.example.test",
  port: 587,
  secure: false,
  user: "watcher",
  pass: "test-password",
  sender: "alerts@example.test",
};

describe("toPlainText", () => {
  it("drops Markdown emphasis and escapes and spells out links", () => {
    expect(toPlainText(message)).toBe(
      "🏠 New listing in Creek Harbour!\n\n1BR _corner_ unit\n\n🔗 Open listing: https://example.test/a?b=1&c=2"
    );
  });
});

describe("buildHtml", () => {
  it("turns the link line into an anchor and escapes text", () => {
    const html = buildHtml(`${message}\n<b>`);

    expect(html).toContain(
      '🔗 <a href="https://example.test/a?b=1&amp;c=2" style="color:#0066c0;">Open listing</a>'
    );
    expect(html).toContain("<br/>\n&lt;b&gt;</p>");
  });
});

describe("createEmailTransport", () => {
  it("sends the message with its first line as subject", async () => {
    await createEmailTransport(options).send("me@example.test", message);

    expect(sendMail).toHaveBeenCalledTimes(1);
    expect(sendMail.mock.calls[0][0]).toMatchObject({
      from: "Listing Watch <alerts@example.test>",
      to: "me@example.test",
      subject: "🏠 New listing in Creek Harbour!",
      text: toPlainText(message),
    });
  });

  it("wraps SMTP failures in DeliveryError", async () => {
    sendMail.mockRejectedValueOnce(new Error("535 authentication failed"));

    const send = createEmailTransport(options).send("me@example.test", message);

    await expect(send).rejects.toBeInstanceOf(DeliveryError);
    await expect(send).rejects.toThrow("SMTP send failed: 535 authentication failed");
  });
});
