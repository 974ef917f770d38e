import { describe, it, expect } from 'vitest'
import { adaptMastodonStatus, decodeHtmlEntities, htmlToPlainText } from '../../src/platforms/mastodon/adapters'
import { MastodonPlatformClient } from '../../src/platforms/mastodon/client'
import { mastodonStatusSchema } from '../../src/platforms/mastodon/types'
import { ProtocolError } from '../../src/platforms/errors'
import { jsonResponse, makePost, queuedFetch } from './setup/factories'

function account(username: string, displayName: string) {
  return {
    id: `acct-${username}`,
    username,
    acct: `${username}@social.example`,
    display_name: displayName,
    avatar: `https://social.example/avatars/${username}.png`,
  }
}

function status(id: string, overrides: Record<string, unknown> = {}) {
  return {
    id,
    created_at: '2024-05-01T10:00:00.000Z',
    content: `<p>status ${id}</p>`,
    url: `https://social.example/@owen/${id}`,
    account: account('owen', 'Owen'),
    favourites_count: 2,
    reblogs_count: 1,
    replies_count: 0,
    favourited: false,
    reblogged: false,
    in_reply_to_id: null,
    media_attachments: [],
    ...overrides,
  }
}

describe('mastodon adapters', () => {
  describe('htmlToPlainText', () => {
    it('should turn breaks and paragraphs into newlines and drop other tags', () => {
      const html = '<p>Hello <a href="https://x.example"><span>world</span></a><br>second line</p><p>next paragraph</p>'
      expect(htmlToPlainText(html)).toBe('Hello world\nsecond line\n\nnext paragraph')
    })

    it('should decode entities after stripping tags', () => {
      expect(htmlToPlainText('<p>&lt;b&gt; &amp; &quot;q&quot; &#39;s&#39; &#x1F418;</p>')).toBe(
        '<b> & "q" \'s\' 🐘'
      )
    })
  })

  it('should leave unknown entities untouched', () => {
    expect(decodeHtmlEntities('&bogus; &amp;')).toBe('&bogus; &')
  })

  it('should map a status to a post', () => {
    const post = adaptMastodonStatus(
      mastodonStatusSchema.parse(
        status('42', {
          in_reply_to_id: '41',
          favourited: true,
          media_attachments: [
            { url: 'https://files.example/a.png', preview_url: null, type: 'image', description: 'a cat' },
            { url: 'https://files.example/b.bin', type: 'weird' },
          ],
        })
      )
    )

    expect(post).toMatchObject({
      networkId: '42',
      network: 'mastodon',
      authorHandle: 'owen@social.example',
      authorName: 'Owen',
      content: 'status 42',
      contentRaw: '<p>status 42</p>',
      createdAt: new Date('2024-05-01T10:00:00.000Z'),
      url: 'https://social.example/@owen/42',
      isRepost: false,
      likeCount: 2,
      repostCount: 1,
      liked: true,
      reposted: false,
      replyToId: '41',
    })
    expect(post.media).toEqual([
      { url: 'https://files.example/a.png', previewUrl: undefined, mediaType: 'image', altText: 'a cat' },
      { url: 'https://files.example/b.bin', previewUrl: undefined, mediaType: 'unknown', altText: undefined },
    ])
  })

  it('should skip attachments that have no url yet', () => {
    const post = adaptMastodonStatus(
      mastodonStatusSchema.parse(
        status('43', {
          media_attachments: [
            { url: null, preview_url: null, type: 'video' },
            { url: 'https://files.example/c.jpg', type: 'image' },
          ],
        })
      )
    )

    expect(post.media).toEqual([
      { url: 'https://files.example/c.jpg', previewUrl: undefined, mediaType: 'image', altText: undefined },
    ])
  })

  it('should unwrap a boost to the original status and name the booster', () => {
    const original = status('7', { account: account('olive', 'Olive') })
    const boost = status('8', { account: account('rudy', 'Rudy'), content: '', reblog: original })

    const post = adaptMastodonStatus(mastodonStatusSchema.parse(boost))

    expect(post.networkId).toBe('7')
    expect(post.authorName).toBe('Olive')
    expect(post.content).toBe('status 7')
    expect(post.isRepost).toBe(true)
    expect(post.repostAuthor).toBe('Rudy')
  })

  it('should fall back to the username for a booster without a display name', () => {
    const boost = status('9', { account: account('rudy', ''), reblog: status('3') })
    expect(adaptMastodonStatus(mastodonStatusSchema.parse(boost)).repostAuthor).toBe('rudy')
  })
})

describe('MastodonPlatformClient', () => {
  it('should fetch the home timeline with the token', async () => {
    const { fetch, requests } = queuedFetch(jsonResponse([status('1'), status('2')]))
    const client = new MastodonPlatformClient('https://social.example/', 'test-secret', { fetch })

    const posts = await client.timeline(20)

    expect(posts.map(post => post.networkId)).toEqual(['1', '2'])
    expect(requests[0]?.url).toBe('https://social.example/api/v1/timelines/home?limit=20')
    expect(requests[0]?.headers.Authorization).toBe('Bearer test-secret')
  })

  it('should return only the descendants of a conversation', async () => {
    const { fetch, requests } = queuedFetch(
      jsonResponse({ ancestors: [status('1')], descendants: [status('3', { in_reply_to_id: '2' })] })
    )
    const client = new MastodonPlatformClient('https://social.example', 'test-secret', { fetch })

    const replies = await client.getContext(makePost({ networkId: '2' }))

    expect(replies.map(reply => reply.networkId)).toEqual(['3'])
    expect(requests[0]?.url).toBe('https://social.example/api/v1/statuses/2/context')
  })

  it('should post a public status', async () => {
    const { fetch, requests } = queuedFetch(jsonResponse(status('10', { content: '<p>hi there</p>' })))
    const client = new MastodonPlatformClient('https://social.example', 'test-secret', { fetch })

    const post = await client.post('hi there')

    expect(post.content).toBe('hi there')
    expect(requests[0]?.body).toEqual({ status: 'hi there', visibility: 'public' })
  })

  it('should reply by native id', async () => {
    const { fetch, requests } = queuedFetch(jsonResponse(status('11', { in_reply_to_id: '10' })))
    const client = new MastodonPlatformClient('https://social.example', 'test-secret', { fetch })

    const reply = await client.reply('agreed', makePost({ networkId: '10' }))

    expect(reply.replyToId).toBe('10')
    expect(requests[0]?.body).toEqual({ status: 'agreed', visibility: 'public', in_reply_to_id: '10' })
  })

  it('should hit the status action endpoints', async () => {
    const { fetch, requests } = queuedFetch(
      jsonResponse(status('5')),
      jsonResponse(status('5')),
      jsonResponse(status('5')),
      jsonResponse(status('5'))
    )
    const client = new MastodonPlatformClient('https://social.example', 'test-secret', { fetch })
    const post = makePost({ networkId: '5' })

    await client.like(post)
    await client.unlike(post)
    await client.repost(post)
    await client.unrepost(post)

    expect(requests.map(request => `${request.method} ${request.url}`)).toEqual([
      'POST https://social.example/api/v1/statuses/5/favourite',
      'POST https://social.example/api/v1/statuses/5/unfavourite',
      'POST https://social.example/api/v1/statuses/5/reblog',
      'POST https://social.example/api/v1/statuses/5/unreblog',
    ])
  })

  it('should prefix failures with the operation', async () => {
    const { fetch } = queuedFetch(new Response('{"error":"Not allowed"}', { status: 403 }))
    const client = new MastodonPlatformClient('https://social.example', 'test-secret', { fetch })

    const failure = client.like(makePost({ networkId: '5' }))
    await expect(failure).rejects.toBeInstanceOf(ProtocolError)
    await expect(failure).rejects.toThrow('Failed to like post: 403 {"error":"Not allowed"}')
  })

  it('should describe the authenticated account', async () => {
    const { fetch } = queuedFetch(jsonResponse(account('alice', 'Alice A.')))
    const client = new MastodonPlatformClient('https://social.example/', 'test-secret', { fetch })

    const verified = await client.verifyCredentials()

    expect(verified).toMatchObject({
      network: 'mastodon',
      handle: 'alice',
      displayName: 'Alice A.',
      server: 'https://social.example',
      avatarUrl: 'https://social.example/avatars/alice.png',
      isDefault: false,
    })
  })
})
