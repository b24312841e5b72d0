import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "Savings Match Simulator",
  description:
    "Costs and benefits of a federal savings match for low- and moderate-income earners",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body className="font-sans antialiased">{children}</body>
    </html>
  );
}
