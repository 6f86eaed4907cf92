import type { ReactNode } from "react";

import "./globals.css";
import Providers from "./providers";

export const metadata = {
  title: "Thesis Portfolio Lab",
  description: "AI-generated portfolios from an investment thesis • not investment advice",
};

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en">
      <body>
        <Providers>{children}</Providers>
      </body>
    </html>
  );
}
