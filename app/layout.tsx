import './globals.css'
import React from 'react'

export const metadata = {
  title: 'Speech to Text',
}

export default function RootLayout({ children }: { children: React.ReactNode }) {
  const commitSha =
    process.env.NEXT_PUBLIC_VERCEL_GIT_COMMIT_SHA ??
    process.env.VERCEL_GIT_COMMIT_SHA ??
    process.env.NEXT_PUBLIC_GIT_COMMIT_SHA ??
    process.env.GIT_COMMIT_SHA ??
    ''
  const shortSha = commitSha ? commitSha.slice(0, 7) : 'local'

  return (
    <html lang="en">
      <body>
        <div className="wave" />
        <div className="site-shell">
          <div className="panel-section">{children}</div>
          <footer className="site-footer">
            <span>{shortSha}</span> · Advice is generated by a language model and is not reviewed by a clinician.
          </footer>
        </div>
      </body>
    </html>
  )
}
